/**
 * WinDetector.ts
 * Line evaluation for an N×N board
 *
 * A line is a full row, column or diagonal of length N. A player wins when
 * every cell of some line holds their mark; there is no shorter winning run.
 */

import { Board, Coordinate, getCell } from './Board';
import { Player } from './Mark';

// ============================================================================
// Types
// ============================================================================

export type LineKind = 'row' | 'column' | 'main-diagonal' | 'anti-diagonal';

export interface Line {
  readonly kind: LineKind;
  /** Row or column index; 0 for diagonals */
  readonly index: number;
  readonly cells: readonly Coordinate[];
}

export interface WinResult {
  readonly winner: Player;
  readonly line: Line;
}

// ============================================================================
// Line Construction
// ============================================================================

function buildLine(size: number, kind: LineKind, index: number): Line {
  const cells: Coordinate[] = [];
  for (let i = 0; i < size; i++) {
    switch (kind) {
      case 'row':
        cells.push({ row: index, column: i });
        break;
      case 'column':
        cells.push({ row: i, column: index });
        break;
      case 'main-diagonal':
        cells.push({ row: i, column: i });
        break;
      case 'anti-diagonal':
        cells.push({ row: i, column: size - 1 - i });
        break;
    }
  }
  return { kind, index, cells };
}

/**
 * Lines that pass through a cell, in the order row, column, main diagonal,
 * anti-diagonal. Diagonals are included only when the cell lies on them.
 */
export function getLinesThrough(size: number, row: number, column: number): readonly Line[] {
  const lines: Line[] = [
    buildLine(size, 'row', row),
    buildLine(size, 'column', column),
  ];
  if (row === column) {
    lines.push(buildLine(size, 'main-diagonal', 0));
  }
  if (row + column === size - 1) {
    lines.push(buildLine(size, 'anti-diagonal', 0));
  }
  return lines;
}

/**
 * All 2N + 2 lines of the board
 */
export function getAllLines(size: number): readonly Line[] {
  const lines: Line[] = [];
  for (let i = 0; i < size; i++) {
    lines.push(buildLine(size, 'row', i));
  }
  for (let i = 0; i < size; i++) {
    lines.push(buildLine(size, 'column', i));
  }
  lines.push(buildLine(size, 'main-diagonal', 0));
  lines.push(buildLine(size, 'anti-diagonal', 0));
  return lines;
}

// ============================================================================
// Evaluation
// ============================================================================

export function isLineOwnedBy(board: Board, line: Line, player: Player): boolean {
  return line.cells.every(({ row, column }) => getCell(board, row, column) === player);
}

/**
 * Check only the lines through the cell just played
 */
export function findWinningLineAt(
  board: Board,
  row: number,
  column: number,
  player: Player
): Line | null {
  for (const line of getLinesThrough(board.size, row, column)) {
    if (isLineOwnedBy(board, line, player)) {
      return line;
    }
  }
  return null;
}

/**
 * Scan every line for a completed one
 */
export function findWinningLine(board: Board): WinResult | null {
  for (const line of getAllLines(board.size)) {
    const first = line.cells[0];
    if (!first) continue;
    const owner = getCell(board, first.row, first.column);
    if (owner !== null && isLineOwnedBy(board, line, owner)) {
      return { winner: owner, line };
    }
  }
  return null;
}
