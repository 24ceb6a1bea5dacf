/**
 * Board.ts
 * Square grid state for a single game
 *
 * Cells are stored row-major in a flat array (index = row * size + column).
 * All updates return a new board; a board value is never mutated.
 */

import { Cell, Player } from './Mark';

// ============================================================================
// Types
// ============================================================================

export interface Coordinate {
  readonly row: number;
  readonly column: number;
}

export interface Board {
  /** Side length N of the N×N grid */
  readonly size: number;
  /** Row-major cells, length size * size */
  readonly cells: readonly Cell[];
}

// ============================================================================
// Constants
// ============================================================================

export const MIN_BOARD_SIZE = 3;
export const MAX_BOARD_SIZE = 9;

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create an empty board. The size is expected to be validated by the caller.
 */
export function createBoard(size: number): Board {
  return {
    size,
    cells: new Array<Cell>(size * size).fill(null),
  };
}

/**
 * Check whether a size is an allowed board size
 */
export function isValidBoardSize(size: number): boolean {
  return Number.isInteger(size) && size >= MIN_BOARD_SIZE && size <= MAX_BOARD_SIZE;
}

// ============================================================================
// Query Functions
// ============================================================================

export function isInBounds(board: Board, row: number, column: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(column) &&
    row >= 0 &&
    row < board.size &&
    column >= 0 &&
    column < board.size
  );
}

export function toIndex(board: Board, row: number, column: number): number {
  return row * board.size + column;
}

/**
 * Get the cell at a coordinate. Out-of-bounds coordinates read as empty.
 */
export function getCell(board: Board, row: number, column: number): Cell {
  if (!isInBounds(board, row, column)) {
    return null;
  }
  return board.cells[toIndex(board, row, column)] ?? null;
}

export function isBoardFull(board: Board): boolean {
  return board.cells.every(cell => cell !== null);
}

export function isBoardEmpty(board: Board): boolean {
  return board.cells.every(cell => cell === null);
}

/**
 * Count the cells holding a player's mark
 */
export function countMarks(board: Board, player: Player): number {
  let count = 0;
  for (const cell of board.cells) {
    if (cell === player) count++;
  }
  return count;
}

/**
 * Coordinates of every empty cell, in row-major order
 */
export function getEmptyCells(board: Board): readonly Coordinate[] {
  const empty: Coordinate[] = [];
  board.cells.forEach((cell, index) => {
    if (cell === null) {
      empty.push({ row: Math.floor(index / board.size), column: index % board.size });
    }
  });
  return empty;
}

/**
 * Board as a list of rows, for rendering
 */
export function getRows(board: Board): readonly (readonly Cell[])[] {
  const rows: Cell[][] = [];
  for (let row = 0; row < board.size; row++) {
    rows.push(board.cells.slice(row * board.size, (row + 1) * board.size));
  }
  return rows;
}

// ============================================================================
// State Transitions
// ============================================================================

/**
 * Place a mark, returning a new board. Callers check bounds and occupancy first.
 */
export function placeMark(board: Board, row: number, column: number, player: Player): Board {
  const cells = [...board.cells];
  cells[toIndex(board, row, column)] = player;
  return {
    size: board.size,
    cells,
  };
}
