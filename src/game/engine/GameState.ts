/**
 * GameState.ts
 * Immutable state of one game: board, player to move, and phase
 */

import { Board, Coordinate, createBoard } from './Board';
import { FIRST_PLAYER, Player } from './Mark';
import { Line } from './WinDetector';

// ============================================================================
// Types
// ============================================================================

export type GameStatus = 'IN_PROGRESS' | 'WON' | 'DRAW';

export interface InProgressPhase {
  readonly status: 'IN_PROGRESS';
}

export interface WonPhase {
  readonly status: 'WON';
  readonly winner: Player;
  readonly winningLine: Line;
}

export interface DrawPhase {
  readonly status: 'DRAW';
}

export type GamePhase = InProgressPhase | WonPhase | DrawPhase;

export interface Move extends Coordinate {
  readonly player: Player;
  /** 1-based position of the move in the game */
  readonly moveNumber: number;
}

export interface GameState {
  readonly board: Board;
  /** Player entitled to the next move; unchanged once the game is over */
  readonly activePlayer: Player;
  readonly phase: GamePhase;
  readonly moveCount: number;
  readonly lastMove: Move | null;
}

// ============================================================================
// Constants
// ============================================================================

export const IN_PROGRESS: InProgressPhase = { status: 'IN_PROGRESS' };

export const DRAW: DrawPhase = { status: 'DRAW' };

// ============================================================================
// Factory Functions
// ============================================================================

export function createGameState(boardSize: number): GameState {
  return {
    board: createBoard(boardSize),
    activePlayer: FIRST_PLAYER,
    phase: IN_PROGRESS,
    moveCount: 0,
    lastMove: null,
  };
}

// ============================================================================
// State Query Functions
// ============================================================================

export function isTerminal(phase: GamePhase): boolean {
  return phase.status !== 'IN_PROGRESS';
}

/**
 * Human-readable phase, e.g. "X won" or "in progress"
 */
export function describePhase(phase: GamePhase): string {
  switch (phase.status) {
    case 'IN_PROGRESS':
      return 'in progress';
    case 'WON':
      return `${phase.winner} won`;
    case 'DRAW':
      return 'draw';
  }
}
