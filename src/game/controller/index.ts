/**
 * Console Controller Module Exports
 */

export { GameController, MESSAGES, isPlayAgain } from './GameController';
export { renderBoard } from './BoardRenderer';
export { ParseResult, MOVE_INPUT_HINT, parseBoardSize, parseMoveInput } from './InputParser';
export { ConsoleIO, createConsoleIO } from './ConsoleIO';
