/**
 * Service Layer Module Exports
 */

// Main service
export { GameService, createGameService } from './GameService';

// Types
export {
  GameServiceConfig,
  DEFAULT_SERVICE_CONFIG,
  ServiceError,
  ServiceErrorCode,
  StartGameResponse,
  MoveRequest,
  MoveResponse,
  GameEventHandler,
  StateChangeHandler,
  EventSubscription,
  ServiceStatus,
} from './ServiceTypes';

// Validation
export {
  ValidationResult,
  validateBoardSize,
  validateMoveRequest,
  toServiceError,
} from './CommandValidator';
