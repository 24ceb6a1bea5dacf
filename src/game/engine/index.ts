/**
 * Game Engine
 *
 * Board state, move legality, turn alternation and win/draw detection.
 */

// Primitives
export * from './Mark';
export * from './Board';

// Rules
export * from './WinDetector';
export * from './GameErrors';
export * from './GameState';
export * from './GameReducers';
export * from './GameEvents';

// Engine
export * from './GameEngine';
