/**
 * GameEvents.ts
 * Events describing what happened in a game
 *
 * Events are immutable records produced by the service layer around the
 * engine. They drive UI updates and give a per-game history.
 */

import { Coordinate } from './Board';
import { Player } from './Mark';
import { Line } from './WinDetector';

// ============================================================================
// Event Types
// ============================================================================

export type GameId = string;

export type GameEventType =
  | 'GAME_STARTED'
  | 'MARK_PLACED'
  | 'MOVE_REJECTED'
  | 'GAME_WON'
  | 'GAME_DRAWN';

// ============================================================================
// Base Event Interface
// ============================================================================

export interface BaseGameEvent {
  readonly type: GameEventType;
  readonly timestamp: number;
  readonly eventId: string;
  readonly gameId: GameId;
  readonly sequence: number;
}

// ============================================================================
// Specific Events
// ============================================================================

export interface GameStartedEvent extends BaseGameEvent {
  readonly type: 'GAME_STARTED';
  readonly boardSize: number;
  readonly firstPlayer: Player;
}

export interface MarkPlacedEvent extends BaseGameEvent {
  readonly type: 'MARK_PLACED';
  readonly player: Player;
  readonly row: number;
  readonly column: number;
  readonly moveNumber: number;
  /** Player to move next, or null when this move ended the game */
  readonly nextPlayer: Player | null;
}

export interface MoveRejectedEvent extends BaseGameEvent {
  readonly type: 'MOVE_REJECTED';
  readonly player: Player;
  readonly row: number;
  readonly column: number;
  readonly errorCode: string;
  readonly errorMessage: string;
}

export interface GameWonEvent extends BaseGameEvent {
  readonly type: 'GAME_WON';
  readonly winner: Player;
  readonly winningLine: Line;
  readonly moveCount: number;
}

export interface GameDrawnEvent extends BaseGameEvent {
  readonly type: 'GAME_DRAWN';
  readonly moveCount: number;
}

// ============================================================================
// Event Union Type
// ============================================================================

export type GameEvent =
  | GameStartedEvent
  | MarkPlacedEvent
  | MoveRejectedEvent
  | GameWonEvent
  | GameDrawnEvent;

// ============================================================================
// Event Factories
// ============================================================================

/** Game id and per-game sequence number stamped on every event */
export interface EventContext {
  readonly gameId: GameId;
  readonly sequence: number;
}

function baseEvent<T extends GameEventType>(type: T, context: EventContext) {
  return {
    type,
    timestamp: Date.now(),
    eventId: `evt_${context.gameId}_${context.sequence}`,
    gameId: context.gameId,
    sequence: context.sequence,
  };
}

export function createGameStartedEvent(
  context: EventContext,
  boardSize: number,
  firstPlayer: Player
): GameStartedEvent {
  return {
    ...baseEvent('GAME_STARTED', context),
    boardSize,
    firstPlayer,
  };
}

export function createMarkPlacedEvent(
  context: EventContext,
  player: Player,
  target: Coordinate,
  moveNumber: number,
  nextPlayer: Player | null
): MarkPlacedEvent {
  return {
    ...baseEvent('MARK_PLACED', context),
    player,
    row: target.row,
    column: target.column,
    moveNumber,
    nextPlayer,
  };
}

export function createMoveRejectedEvent(
  context: EventContext,
  player: Player,
  target: Coordinate,
  errorCode: string,
  errorMessage: string
): MoveRejectedEvent {
  return {
    ...baseEvent('MOVE_REJECTED', context),
    player,
    row: target.row,
    column: target.column,
    errorCode,
    errorMessage,
  };
}

export function createGameWonEvent(
  context: EventContext,
  winner: Player,
  winningLine: Line,
  moveCount: number
): GameWonEvent {
  return {
    ...baseEvent('GAME_WON', context),
    winner,
    winningLine,
    moveCount,
  };
}

export function createGameDrawnEvent(context: EventContext, moveCount: number): GameDrawnEvent {
  return {
    ...baseEvent('GAME_DRAWN', context),
    moveCount,
  };
}

// ============================================================================
// Event Emitter
// ============================================================================

export type GameEventListener = (event: GameEvent) => void;

export interface GameEventEmitter {
  on(listener: GameEventListener): () => void;
  emit(event: GameEvent): void;
  getHistory(): readonly GameEvent[];
  clear(): void;
}

/**
 * Simple event emitter with history. Listener errors are reported to the
 * error handler and do not stop delivery to the remaining listeners.
 */
export function createGameEventEmitter(
  onListenerError: (error: unknown) => void
): GameEventEmitter {
  const listeners: Set<GameEventListener> = new Set();
  const history: GameEvent[] = [];

  return {
    on(listener: GameEventListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    emit(event: GameEvent): void {
      history.push(event);
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          onListenerError(error);
        }
      }
    },

    getHistory(): readonly GameEvent[] {
      return [...history];
    },

    clear(): void {
      history.length = 0;
    },
  };
}
