/**
 * CommandValidator.ts
 * Request validation for the GameService layer
 *
 * Validates requests before they reach the game engine. All validation is
 * deterministic and stateless.
 */

import { MAX_BOARD_SIZE, MIN_BOARD_SIZE, isValidBoardSize } from '../engine/Board';
import { GameError, GameErrorCode } from '../engine/GameErrors';
import { validateMove } from '../engine/GameReducers';
import { GameState } from '../engine/GameState';
import { MoveRequest, ServiceError, ServiceErrorCode } from './ServiceTypes';

// ============================================================================
// Validation Result Types
// ============================================================================

export interface ValidationResult {
  readonly valid: boolean;
  readonly error?: ServiceError;
}

// ============================================================================
// Game Validation
// ============================================================================

/**
 * Validate a board size before a game is created
 */
export function validateBoardSize(boardSize: number): ValidationResult {
  if (!isValidBoardSize(boardSize)) {
    return createError(
      'INVALID_CONFIGURATION',
      `Board size must be an integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}, got ${boardSize}`,
      { boardSize, minSize: MIN_BOARD_SIZE, maxSize: MAX_BOARD_SIZE }
    );
  }
  return { valid: true };
}

/**
 * Validate a move request against the current game state
 */
export function validateMoveRequest(
  request: MoveRequest,
  state: GameState | null
): ValidationResult {
  if (!state) {
    return createError('NO_ACTIVE_GAME', 'No game has been started');
  }

  const error = validateMove(state, request);
  if (error) {
    return { valid: false, error: toServiceError(error) };
  }

  return { valid: true };
}

// ============================================================================
// Error Mapping
// ============================================================================

/**
 * Map an engine error to the service error shape
 */
export function toServiceError(error: GameError): ServiceError {
  return {
    code: mapErrorCode(error.code),
    message: error.message,
    details: error.details,
  };
}

function mapErrorCode(code: GameErrorCode): ServiceErrorCode {
  switch (code) {
    case GameErrorCode.INVALID_CONFIGURATION:
      return 'INVALID_CONFIGURATION';
    case GameErrorCode.OUT_OF_BOUNDS:
      return 'OUT_OF_BOUNDS';
    case GameErrorCode.CELL_OCCUPIED:
      return 'CELL_OCCUPIED';
    case GameErrorCode.GAME_ALREADY_OVER:
      return 'GAME_ALREADY_OVER';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function createError(
  code: ServiceErrorCode,
  message: string,
  details?: Record<string, unknown>
): ValidationResult {
  return {
    valid: false,
    error: {
      code,
      message,
      details,
    },
  };
}
