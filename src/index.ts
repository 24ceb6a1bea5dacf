/**
 * Public entry point
 */

export * from './game';
