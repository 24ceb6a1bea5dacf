/**
 * GameErrors.ts
 * Typed errors raised by the game engine
 *
 * Every error is a caller mistake; none is retryable by the engine and none
 * changes game state.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum GameErrorCode {
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  OUT_OF_BOUNDS = 'OUT_OF_BOUNDS',
  CELL_OCCUPIED = 'CELL_OCCUPIED',
  GAME_ALREADY_OVER = 'GAME_ALREADY_OVER',
}

// ============================================================================
// Base Error Class
// ============================================================================

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GameErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

export class InvalidConfigurationError extends GameError {
  constructor(boardSize: number, minSize: number, maxSize: number) {
    super(
      GameErrorCode.INVALID_CONFIGURATION,
      `Board size must be an integer between ${minSize} and ${maxSize}, got ${boardSize}`,
      { boardSize, minSize, maxSize }
    );
    this.name = 'InvalidConfigurationError';
  }
}

export class OutOfBoundsError extends GameError {
  constructor(row: number, column: number, boardSize: number) {
    super(
      GameErrorCode.OUT_OF_BOUNDS,
      `Cell (${row}, ${column}) is outside the ${boardSize}x${boardSize} board`,
      { row, column, boardSize }
    );
    this.name = 'OutOfBoundsError';
  }
}

export class CellOccupiedError extends GameError {
  constructor(row: number, column: number, occupant: string) {
    super(
      GameErrorCode.CELL_OCCUPIED,
      `Cell (${row}, ${column}) is already taken by ${occupant}`,
      { row, column, occupant }
    );
    this.name = 'CellOccupiedError';
  }
}

export class GameAlreadyOverError extends GameError {
  constructor(status: string) {
    super(
      GameErrorCode.GAME_ALREADY_OVER,
      `No moves can be made once the game is over (${status})`,
      { status }
    );
    this.name = 'GameAlreadyOverError';
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
