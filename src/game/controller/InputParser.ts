/**
 * InputParser.ts
 * Turns console text into board sizes and move coordinates
 *
 * Parsing only checks the shape of the input. Whether a size or a cell is
 * allowed is decided by the engine.
 */

import { MoveRequest } from '../service/ServiceTypes';

// ============================================================================
// Types
// ============================================================================

export type ParseResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: string };

export const MOVE_INPUT_HINT = 'Please enter column and row (e.g., 12)';

// ============================================================================
// Parsers
// ============================================================================

/**
 * Parse a board size such as "5"
 */
export function parseBoardSize(text: string): ParseResult<number> {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { success: false, error: `"${trimmed}" is not a whole number` };
  }
  return { success: true, value: Number.parseInt(trimmed, 10) };
}

/**
 * Parse a two-digit move: column first, then row, both 1-based.
 * "12" is column 1, row 2, i.e. { row: 1, column: 0 }.
 */
export function parseMoveInput(text: string): ParseResult<MoveRequest> {
  const trimmed = text.trim();
  if (!/^\d\d$/.test(trimmed)) {
    return { success: false, error: MOVE_INPUT_HINT };
  }

  const column = Number(trimmed[0]) - 1;
  const row = Number(trimmed[1]) - 1;
  return { success: true, value: { row, column } };
}
