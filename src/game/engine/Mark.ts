/**
 * Mark.ts
 * Player identities and the marks they leave on the board.
 */

// ============================================================================
// Types
// ============================================================================

export type Player = 'X' | 'O';

/** A cell holds a player's mark, or null while empty */
export type Cell = Player | null;

// ============================================================================
// Constants
// ============================================================================

export const FIRST_PLAYER: Player = 'X';

export const EMPTY_CELL_SYMBOL = '-';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Get the player who moves after the given one
 */
export function getOpponent(player: Player): Player {
  return player === 'X' ? 'O' : 'X';
}

/**
 * Display symbol for a cell
 */
export function formatCell(cell: Cell): string {
  return cell ?? EMPTY_CELL_SYMBOL;
}
