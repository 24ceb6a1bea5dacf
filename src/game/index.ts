/**
 * Game Module
 *
 * Tic-tac-toe engine, service layer, and console controller.
 */

// Core engine
export * from './engine';

// Service layer
export * from './service';

// Console controller
export * from './controller';
