/**
 * GameEngine.ts
 * Holds the state of one game and applies moves to it
 *
 * The engine is synchronous and performs no I/O. It is not safe for
 * concurrent use; a host running several games keeps one engine per game.
 */

import { MAX_BOARD_SIZE, MIN_BOARD_SIZE, isValidBoardSize } from './Board';
import { InvalidConfigurationError } from './GameErrors';
import { reduceMove } from './GameReducers';
import { GamePhase, GameState, Move, createGameState, isTerminal } from './GameState';

// ============================================================================
// Types
// ============================================================================

export interface MoveResult {
  readonly move: Move;
  readonly phase: GamePhase;
  readonly state: GameState;
}

// ============================================================================
// Game Engine
// ============================================================================

export class GameEngine {
  private state: GameState;
  private readonly moves: Move[];

  /**
   * @throws InvalidConfigurationError when the size is not an integer in [3, 9]
   */
  constructor(boardSize: number) {
    if (!isValidBoardSize(boardSize)) {
      throw new InvalidConfigurationError(boardSize, MIN_BOARD_SIZE, MAX_BOARD_SIZE);
    }
    this.state = createGameState(boardSize);
    this.moves = [];
  }

  /**
   * Snapshot of the board, active player and phase
   */
  currentState(): GameState {
    return this.state;
  }

  /**
   * Place the active player's mark at (row, column).
   *
   * @throws GameAlreadyOverError, OutOfBoundsError or CellOccupiedError,
   *   checked in that order; state is left unchanged
   */
  applyMove(row: number, column: number): MoveResult {
    const result = reduceMove(this.state, { row, column });
    if (!result.success) {
      throw result.error;
    }

    this.state = result.state;
    this.moves.push(result.move);

    return {
      move: result.move,
      phase: result.state.phase,
      state: result.state,
    };
  }

  getBoardSize(): number {
    return this.state.board.size;
  }

  isGameOver(): boolean {
    return isTerminal(this.state.phase);
  }

  /**
   * Moves applied so far, oldest first
   */
  getMoveHistory(): readonly Move[] {
    return [...this.moves];
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createGameEngine(boardSize: number): GameEngine {
  return new GameEngine(boardSize);
}
