/**
 * ConsoleIO.ts
 * Line-based terminal I/O used by the GameController
 */

import { createInterface } from 'readline';

// ============================================================================
// Types
// ============================================================================

export interface ConsoleIO {
  /** Ask a question and resolve with the answer, or null once input has ended */
  prompt(query: string): Promise<string | null>;
  print(line: string): void;
  clear(): void;
  close(): void;
}

// ============================================================================
// Node Implementation
// ============================================================================

/**
 * Console I/O over process streams. Lines are read through the readline
 * async iterator so piped input is not lost between prompts.
 */
export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsoleIO {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async prompt(query: string): Promise<string | null> {
      output.write(query);
      const next = await lines.next();
      return next.done ? null : next.value;
    },

    print(line: string): void {
      output.write(`${line}\n`);
    },

    clear(): void {
      console.clear();
    },

    close(): void {
      rl.close();
    },
  };
}
