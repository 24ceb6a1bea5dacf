/**
 * GameService.ts
 * Service layer for game orchestration
 *
 * Wraps one GameEngine at a time with:
 * - Request validation before execution
 * - Engine errors returned as response objects
 * - Event and state-change subscriptions
 *
 * Rejected requests never modify game state.
 */

import { GameEngine } from '../engine/GameEngine';
import { isGameError } from '../engine/GameErrors';
import {
  EventContext,
  GameEvent,
  GameEventEmitter,
  GameId,
  createGameDrawnEvent,
  createGameEventEmitter,
  createGameStartedEvent,
  createGameWonEvent,
  createMarkPlacedEvent,
  createMoveRejectedEvent,
} from '../engine/GameEvents';
import { GameState, Move, isTerminal } from '../engine/GameState';
import { toServiceError, validateBoardSize, validateMoveRequest } from './CommandValidator';
import {
  DEFAULT_SERVICE_CONFIG,
  EventSubscription,
  GameEventHandler,
  GameServiceConfig,
  MoveRequest,
  MoveResponse,
  ServiceError,
  ServiceStatus,
  StartGameResponse,
  StateChangeHandler,
} from './ServiceTypes';

// ============================================================================
// Game Service Implementation
// ============================================================================

export class GameService {
  private readonly config: GameServiceConfig;
  private readonly eventEmitter: GameEventEmitter;
  private readonly stateListeners: Set<StateChangeHandler>;
  private engine: GameEngine | null;
  private gameId: GameId | null;
  private gamesStarted: number;
  private eventSequence: number;

  constructor(config: Partial<GameServiceConfig> = {}) {
    this.config = { ...DEFAULT_SERVICE_CONFIG, ...config };
    this.eventEmitter = createGameEventEmitter((error) => {
      console.error('Event listener error:', error);
    });
    this.stateListeners = new Set();
    this.engine = null;
    this.gameId = null;
    this.gamesStarted = 0;
    this.eventSequence = 0;
  }

  // ==========================================================================
  // Game Lifecycle
  // ==========================================================================

  /**
   * Start a new game, discarding the current one
   */
  startGame(boardSize: number = this.config.boardSize): StartGameResponse {
    const validation = validateBoardSize(boardSize);
    if (!validation.valid) {
      return { success: false, error: validation.error ?? internalError('Invalid board size') };
    }

    let engine: GameEngine;
    try {
      engine = new GameEngine(boardSize);
    } catch (error) {
      return { success: false, error: toResponseError(error) };
    }

    this.engine = engine;
    this.gameId = `${this.config.gameIdPrefix}_${++this.gamesStarted}`;
    this.eventSequence = 0;
    this.eventEmitter.clear();

    const state = engine.currentState();
    this.eventEmitter.emit(createGameStartedEvent(
      this.nextEventContext(this.gameId),
      boardSize,
      state.activePlayer
    ));
    this.notifyStateChange(state);

    return { success: true, gameId: this.gameId, state };
  }

  /**
   * Submit a move for the active player
   */
  submitMove(request: MoveRequest): MoveResponse {
    const state = this.engine?.currentState() ?? null;
    const validation = validateMoveRequest(request, state);

    if (!validation.valid) {
      const error = validation.error ?? internalError('Move rejected');
      this.emitRejection(request, error);
      return { success: false, error };
    }

    if (!this.engine || !this.gameId) {
      return { success: false, error: { code: 'NO_ACTIVE_GAME', message: 'No game has been started' } };
    }

    try {
      const result = this.engine.applyMove(request.row, request.column);
      const { move, phase, state: newState } = result;

      this.eventEmitter.emit(createMarkPlacedEvent(
        this.nextEventContext(this.gameId),
        move.player,
        move,
        move.moveNumber,
        isTerminal(phase) ? null : newState.activePlayer
      ));

      if (phase.status === 'WON') {
        this.eventEmitter.emit(createGameWonEvent(
          this.nextEventContext(this.gameId),
          phase.winner,
          phase.winningLine,
          newState.moveCount
        ));
      } else if (phase.status === 'DRAW') {
        this.eventEmitter.emit(createGameDrawnEvent(
          this.nextEventContext(this.gameId),
          newState.moveCount
        ));
      }

      this.notifyStateChange(newState);

      return { success: true, move, phase, newState };
    } catch (error) {
      const responseError = toResponseError(error);
      this.emitRejection(request, responseError);
      return { success: false, error: responseError };
    }
  }

  // ==========================================================================
  // State Queries
  // ==========================================================================

  /**
   * Get current game state, or null before the first game
   */
  getGameState(): GameState | null {
    return this.engine?.currentState() ?? null;
  }

  getCurrentGameId(): GameId | null {
    return this.gameId;
  }

  /**
   * Whether the current game has reached a terminal phase
   */
  isGameOver(): boolean {
    return this.engine?.isGameOver() ?? false;
  }

  getMoveHistory(): readonly Move[] {
    return this.engine?.getMoveHistory() ?? [];
  }

  /**
   * Events of the current game, oldest first
   */
  getEventHistory(): readonly GameEvent[] {
    return this.eventEmitter.getHistory();
  }

  // ==========================================================================
  // Event Subscriptions
  // ==========================================================================

  onEvent(handler: GameEventHandler): EventSubscription {
    const off = this.eventEmitter.on(handler);
    return {
      unsubscribe: () => {
        off();
      },
    };
  }

  onStateChange(handler: StateChangeHandler): EventSubscription {
    this.stateListeners.add(handler);
    return {
      unsubscribe: () => {
        this.stateListeners.delete(handler);
      },
    };
  }

  // ==========================================================================
  // Service Status
  // ==========================================================================

  getStatus(): ServiceStatus {
    const state = this.getGameState();
    return {
      currentGameId: this.gameId,
      gamesStarted: this.gamesStarted,
      moveCount: state?.moveCount ?? 0,
      status: state?.phase.status ?? null,
    };
  }

  getConfig(): GameServiceConfig {
    return { ...this.config };
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private nextEventContext(gameId: GameId): EventContext {
    return { gameId, sequence: ++this.eventSequence };
  }

  private emitRejection(request: MoveRequest, error: ServiceError): void {
    const state = this.engine?.currentState();
    if (!state || !this.gameId) return;

    this.eventEmitter.emit(createMoveRejectedEvent(
      this.nextEventContext(this.gameId),
      state.activePlayer,
      request,
      error.code,
      error.message
    ));
  }

  private notifyStateChange(state: GameState): void {
    for (const listener of this.stateListeners) {
      try {
        listener(state);
      } catch (error) {
        console.error('State listener error:', error);
      }
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function internalError(message: string): ServiceError {
  return { code: 'INTERNAL_ERROR', message };
}

function toResponseError(error: unknown): ServiceError {
  if (isGameError(error)) {
    return toServiceError(error);
  }
  return internalError(error instanceof Error ? error.message : 'Unknown error');
}

// ============================================================================
// Factory Function
// ============================================================================

export function createGameService(config?: Partial<GameServiceConfig>): GameService {
  return new GameService(config);
}
