/**
 * ServiceTypes.ts
 * Type definitions for the GameService layer
 *
 * Typed request/response shapes for the console driver (or any other
 * in-process consumer) talking to the game engine.
 */

import { GameEvent, GameId } from '../engine/GameEvents';
import { GamePhase, GameState, GameStatus, Move } from '../engine/GameState';

// ============================================================================
// Service Configuration
// ============================================================================

export interface GameServiceConfig {
  /** Prefix for generated game ids */
  readonly gameIdPrefix: string;
  /** Board size used when startGame is called without one */
  readonly boardSize: number;
}

export const DEFAULT_SERVICE_CONFIG: GameServiceConfig = {
  gameIdPrefix: 'game',
  boardSize: 3,
};

// ============================================================================
// Error Types
// ============================================================================

export type ServiceErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'NO_ACTIVE_GAME'
  | 'OUT_OF_BOUNDS'
  | 'CELL_OCCUPIED'
  | 'GAME_ALREADY_OVER'
  | 'INTERNAL_ERROR';

export interface ServiceError {
  readonly code: ServiceErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

// ============================================================================
// Game Lifecycle Types
// ============================================================================

export type StartGameResponse =
  | { readonly success: true; readonly gameId: GameId; readonly state: GameState }
  | { readonly success: false; readonly error: ServiceError };

// ============================================================================
// Move Request/Response Types
// ============================================================================

export interface MoveRequest {
  readonly row: number;
  readonly column: number;
}

export type MoveResponse =
  | {
      readonly success: true;
      readonly move: Move;
      readonly phase: GamePhase;
      readonly newState: GameState;
    }
  | { readonly success: false; readonly error: ServiceError };

// ============================================================================
// Event Subscription Types
// ============================================================================

export type GameEventHandler = (event: GameEvent) => void;
export type StateChangeHandler = (state: GameState) => void;

export interface EventSubscription {
  readonly unsubscribe: () => void;
}

// ============================================================================
// Service Status Types
// ============================================================================

export interface ServiceStatus {
  readonly currentGameId: GameId | null;
  readonly gamesStarted: number;
  readonly moveCount: number;
  readonly status: GameStatus | null;
}
