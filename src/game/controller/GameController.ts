/**
 * GameController.ts
 * Console game loop
 *
 * Asks for a board size once, then plays games until the players decline
 * another round or input ends. All rule decisions come from the GameService;
 * this class only prompts, prints, and reacts to responses.
 */

import { GameState } from '../engine/GameState';
import { validateBoardSize } from '../service/CommandValidator';
import { GameService, createGameService } from '../service/GameService';
import { renderBoard } from './BoardRenderer';
import { ConsoleIO } from './ConsoleIO';
import { MOVE_INPUT_HINT, parseBoardSize, parseMoveInput } from './InputParser';

// ============================================================================
// Messages
// ============================================================================

export const MESSAGES = {
  boardSizePrompt: '🧩 Select board size: ',
  turnPrompt: (player: string) => `🧍 Player ${player}'s turn (column+row): `,
  playAgainPrompt: '\n❓ Play again? (y/n): ',
  invalidInput: `❌ Invalid input! ${MOVE_INPUT_HINT}`,
  invalidMove: '❌ Invalid move! Try again.',
  win: (player: string) => `🎉 Player ${player} wins! 🎉`,
  draw: "😫 It's a tie!",
} as const;

/**
 * Empty answer or "y" means yes
 */
export function isPlayAgain(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === '' || normalized === 'y';
}

// ============================================================================
// Game Controller
// ============================================================================

export class GameController {
  private readonly io: ConsoleIO;
  private readonly service: GameService;

  constructor(io: ConsoleIO, service: GameService = createGameService()) {
    this.io = io;
    this.service = service;
  }

  /**
   * Run games until the players stop or input ends
   */
  async run(): Promise<void> {
    const boardSize = await this.promptBoardSize();
    if (boardSize === null) return;

    for (;;) {
      const finished = await this.playGame(boardSize);
      if (!finished) return;

      const answer = await this.io.prompt(MESSAGES.playAgainPrompt);
      if (answer === null || !isPlayAgain(answer)) return;
    }
  }

  /**
   * Ask until a valid board size is given. Resolves null if input ends.
   */
  private async promptBoardSize(): Promise<number | null> {
    for (;;) {
      const answer = await this.io.prompt(MESSAGES.boardSizePrompt);
      if (answer === null) return null;

      const parsed = parseBoardSize(answer);
      if (!parsed.success) {
        this.io.print(`❌ ${parsed.error}`);
        continue;
      }

      const validation = validateBoardSize(parsed.value);
      if (!validation.valid) {
        this.io.print(`❌ ${validation.error?.message ?? 'Invalid board size'}`);
        continue;
      }

      return parsed.value;
    }
  }

  /**
   * Play one game. Resolves true when the game reached a result,
   * false when input ended first.
   */
  private async playGame(boardSize: number): Promise<boolean> {
    const started = this.service.startGame(boardSize);
    if (!started.success) {
      this.io.print(`❌ ${started.error.message}`);
      return false;
    }

    this.io.clear();
    let state: GameState = started.state;

    for (;;) {
      this.printBoard(state);

      const answer = await this.io.prompt(MESSAGES.turnPrompt(state.activePlayer));
      if (answer === null) return false;

      const parsed = parseMoveInput(answer);
      if (!parsed.success) {
        this.io.print(MESSAGES.invalidInput);
        continue;
      }

      const response = this.service.submitMove(parsed.value);
      if (!response.success) {
        this.io.print(MESSAGES.invalidMove);
        continue;
      }

      state = response.newState;
      const { phase } = response;

      if (phase.status === 'WON') {
        this.printBoard(state);
        this.io.print(MESSAGES.win(phase.winner));
        return true;
      }

      if (phase.status === 'DRAW') {
        this.printBoard(state);
        this.io.print(MESSAGES.draw);
        return true;
      }
    }
  }

  private printBoard(state: GameState): void {
    for (const line of renderBoard(state.board)) {
      this.io.print(line);
    }
  }
}
