#!/usr/bin/env node
/**
 * Console entry point: play tic-tac-toe on a 3×3 to 9×9 board
 */

import { GameController } from './game/controller/GameController';
import { createConsoleIO } from './game/controller/ConsoleIO';

async function main(): Promise<void> {
  const io = createConsoleIO();
  try {
    await new GameController(io).run();
  } finally {
    io.close();
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exitCode = 1;
});
