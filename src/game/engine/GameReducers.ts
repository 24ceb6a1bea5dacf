/**
 * GameReducers.ts
 * Pure state transition for placing a mark
 *
 * Reducers take state + move and return a new state. A rejected move
 * returns the original state object together with the error.
 */

import { Coordinate, getCell, isBoardFull, isInBounds, placeMark } from './Board';
import {
  CellOccupiedError,
  GameAlreadyOverError,
  GameError,
  OutOfBoundsError,
} from './GameErrors';
import { DRAW, GamePhase, GameState, Move, describePhase, isTerminal } from './GameState';
import { getOpponent } from './Mark';
import { findWinningLineAt } from './WinDetector';

// ============================================================================
// Reducer Result Type
// ============================================================================

export type ReducerResult =
  | { readonly success: true; readonly state: GameState; readonly move: Move }
  | { readonly success: false; readonly state: GameState; readonly error: GameError };

// ============================================================================
// Validation
// ============================================================================

/**
 * Check a move against the current state. Checks run in a fixed order:
 * game over, then bounds, then occupancy.
 */
export function validateMove(state: GameState, target: Coordinate): GameError | null {
  if (isTerminal(state.phase)) {
    return new GameAlreadyOverError(describePhase(state.phase));
  }

  const { row, column } = target;
  if (!isInBounds(state.board, row, column)) {
    return new OutOfBoundsError(row, column, state.board.size);
  }

  const occupant = getCell(state.board, row, column);
  if (occupant !== null) {
    return new CellOccupiedError(row, column, occupant);
  }

  return null;
}

// ============================================================================
// Reducers
// ============================================================================

/**
 * Place the active player's mark and resolve the resulting phase
 */
export function reduceMove(state: GameState, target: Coordinate): ReducerResult {
  const error = validateMove(state, target);
  if (error) {
    return { success: false, state, error };
  }

  const { row, column } = target;
  const player = state.activePlayer;
  const board = placeMark(state.board, row, column, player);
  const move: Move = { row, column, player, moveNumber: state.moveCount + 1 };

  // A full board with a completed line is a win, so wins are checked first
  let phase: GamePhase = state.phase;
  const winningLine = findWinningLineAt(board, row, column, player);
  if (winningLine) {
    phase = { status: 'WON', winner: player, winningLine };
  } else if (isBoardFull(board)) {
    phase = DRAW;
  }

  return {
    success: true,
    move,
    state: {
      board,
      activePlayer: isTerminal(phase) ? player : getOpponent(player),
      phase,
      moveCount: move.moveNumber,
      lastMove: move,
    },
  };
}
