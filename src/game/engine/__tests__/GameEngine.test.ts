/**
 * GameEngine.test.ts
 * Tests for the game engine
 *
 * Tests cover:
 * - Construction and board size limits
 * - Turn alternation
 * - Row, column and diagonal wins on several board sizes
 * - Draw detection
 * - Rejected moves leaving state unchanged
 */

import { countMarks, getCell } from '../Board';
import { GameEngine, createGameEngine } from '../GameEngine';
import {
  CellOccupiedError,
  GameAlreadyOverError,
  GameError,
  GameErrorCode,
  InvalidConfigurationError,
  OutOfBoundsError,
} from '../GameErrors';

// ============================================================================
// Test Setup
// ============================================================================

type Coord = readonly [number, number];

function play(engine: GameEngine, moves: readonly Coord[]): void {
  for (const [row, column] of moves) {
    engine.applyMove(row, column);
  }
}

/** Deterministic pseudo-random generator for move sequences */
function createRandom(seed: number): () => number {
  let value = seed;
  return () => {
    value = (value * 1103515245 + 12345) % 2147483648;
    return value / 2147483648;
  };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// ============================================================================
// Construction
// ============================================================================

describe('GameEngine', () => {
  describe('construction', () => {
    it.each([3, 4, 5, 6, 7, 8, 9])('starts a fresh game on a board of size %i', (size) => {
      const engine = createGameEngine(size);
      const state = engine.currentState();

      expect(state.board.size).toBe(size);
      expect(state.board.cells.every(cell => cell === null)).toBe(true);
      expect(state.activePlayer).toBe('X');
      expect(state.phase).toEqual({ status: 'IN_PROGRESS' });
      expect(state.moveCount).toBe(0);
      expect(state.lastMove).toBeNull();
    });

    it.each([2, 10, 0, -1, 4.5])('rejects board size %p', (size) => {
      expect(() => new GameEngine(size)).toThrow(InvalidConfigurationError);
    });

    it('reports the allowed range in the configuration error', () => {
      const error = captureError(() => new GameEngine(12));
      expect(error).toBeInstanceOf(GameError);
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (!(error instanceof GameError)) return;
      expect(error.code).toBe(GameErrorCode.INVALID_CONFIGURATION);
      expect(error.details).toEqual({ boardSize: 12, minSize: 3, maxSize: 9 });
      expect(error.toJSON()).toEqual({
        name: 'InvalidConfigurationError',
        code: 'INVALID_CONFIGURATION',
        message: 'Board size must be an integer between 3 and 9, got 12',
        details: { boardSize: 12, minSize: 3, maxSize: 9 },
      });
    });
  });

  // ==========================================================================
  // Reads
  // ==========================================================================

  describe('currentState', () => {
    it('returns identical snapshots until a move is applied', () => {
      const engine = new GameEngine(3);
      engine.applyMove(1, 1);

      const first = engine.currentState();
      const second = engine.currentState();
      expect(second).toBe(first);
      expect(second).toEqual(first);
    });

    it('does not change an earlier snapshot when a later move is applied', () => {
      const engine = new GameEngine(3);
      const before = engine.currentState();
      engine.applyMove(0, 0);

      expect(getCell(before.board, 0, 0)).toBeNull();
      expect(before.activePlayer).toBe('X');
      expect(getCell(engine.currentState().board, 0, 0)).toBe('X');
    });
  });

  // ==========================================================================
  // Turn Alternation
  // ==========================================================================

  describe('turn alternation', () => {
    it('flips the active player after each valid move', () => {
      const engine = new GameEngine(3);
      expect(engine.applyMove(0, 0).state.activePlayer).toBe('O');
      expect(engine.applyMove(1, 1).state.activePlayer).toBe('X');
      expect(engine.currentState().lastMove).toEqual({
        row: 1,
        column: 1,
        player: 'O',
        moveNumber: 2,
      });
    });

    it('keeps the active player after an invalid move', () => {
      const engine = new GameEngine(3);
      engine.applyMove(0, 0);

      expect(() => engine.applyMove(0, 0)).toThrow(CellOccupiedError);
      expect(engine.currentState().activePlayer).toBe('O');
    });

    it.each([1, 7, 42, 2024])('keeps X - O at 0 or 1 for random games (seed %i)', (seed) => {
      const random = createRandom(seed);

      for (const size of [3, 4, 5]) {
        const engine = new GameEngine(size);
        while (!engine.isGameOver()) {
          const state = engine.currentState();
          const empty = state.board.cells
            .map((cell, index) => (cell === null ? index : -1))
            .filter(index => index >= 0);
          const pick = empty[Math.floor(random() * empty.length)] ?? 0;

          const diffBefore = countMarks(state.board, 'X') - countMarks(state.board, 'O');
          expect(diffBefore).toBe(state.activePlayer === 'X' ? 0 : 1);

          engine.applyMove(Math.floor(pick / size), pick % size);

          const after = engine.currentState().board;
          const diffAfter = countMarks(after, 'X') - countMarks(after, 'O');
          expect([0, 1]).toContain(diffAfter);
        }
      }
    });
  });

  // ==========================================================================
  // Wins and Draws
  // ==========================================================================

  describe('win detection', () => {
    it('declares X the winner of a completed top row on 3×3', () => {
      const engine = new GameEngine(3);
      play(engine, [[0, 0], [1, 0], [0, 1], [1, 1]]);
      expect(engine.currentState().phase.status).toBe('IN_PROGRESS');

      const result = engine.applyMove(0, 2);
      expect(result.phase.status).toBe('WON');
      if (result.phase.status !== 'WON') return;
      expect(result.phase.winner).toBe('X');
      expect(result.phase.winningLine.kind).toBe('row');
      expect(result.phase.winningLine.cells).toEqual([
        { row: 0, column: 0 },
        { row: 0, column: 1 },
        { row: 0, column: 2 },
      ]);
    });

    it('declares X the winner of the main diagonal on 5×5', () => {
      const engine = new GameEngine(5);
      play(engine, [
        [0, 0], [0, 1],
        [1, 1], [0, 2],
        [2, 2], [0, 3],
        [3, 3], [0, 4],
      ]);
      expect(engine.currentState().phase.status).toBe('IN_PROGRESS');

      const result = engine.applyMove(4, 4);
      expect(result.phase).toMatchObject({ status: 'WON', winner: 'X' });
      expect(engine.currentState().phase).toMatchObject({
        status: 'WON',
        winningLine: { kind: 'main-diagonal' },
      });
    });

    it('lets O win a column', () => {
      const engine = new GameEngine(3);
      play(engine, [[0, 0], [0, 2], [1, 1], [1, 2], [2, 0]]);

      const result = engine.applyMove(2, 2);
      expect(result.phase).toMatchObject({ status: 'WON', winner: 'O' });
      expect(result.state.activePlayer).toBe('O');
    });

    it('detects the anti-diagonal on 4×4', () => {
      const engine = new GameEngine(4);
      play(engine, [
        [0, 3], [0, 0],
        [1, 2], [1, 0],
        [2, 1], [2, 0],
      ]);

      const result = engine.applyMove(3, 0);
      expect(result.phase).toMatchObject({
        status: 'WON',
        winner: 'X',
        winningLine: { kind: 'anti-diagonal' },
      });
    });

    it('counts a full board with a completed line as a win, not a draw', () => {
      const engine = new GameEngine(3);
      // X O X / O X O / O X _ ; X completes the main diagonal on the last cell
      play(engine, [
        [0, 0], [0, 1],
        [0, 2], [1, 0],
        [1, 1], [1, 2],
        [2, 1], [2, 0],
      ]);

      const result = engine.applyMove(2, 2);
      expect(result.state.board.cells.every(cell => cell !== null)).toBe(true);
      expect(result.phase).toMatchObject({ status: 'WON', winner: 'X' });
    });
  });

  describe('draw detection', () => {
    it('declares a draw when the 3×3 board fills without a line', () => {
      const engine = new GameEngine(3);
      play(engine, [
        [0, 0], [0, 1],
        [0, 2], [1, 1],
        [1, 0], [1, 2],
        [2, 1], [2, 0],
      ]);
      expect(engine.currentState().phase.status).toBe('IN_PROGRESS');

      const result = engine.applyMove(2, 2);
      expect(result.phase).toEqual({ status: 'DRAW' });
      expect(result.state.moveCount).toBe(9);
      expect(engine.isGameOver()).toBe(true);
    });
  });

  // ==========================================================================
  // Rejected Moves
  // ==========================================================================

  describe('rejected moves', () => {
    it('rejects (3, 0) on a 3×3 board and keeps the fresh state', () => {
      const engine = new GameEngine(3);
      const before = engine.currentState();

      expect(() => engine.applyMove(3, 0)).toThrow(OutOfBoundsError);
      expect(engine.currentState()).toBe(before);
      expect(engine.currentState().phase).toEqual({ status: 'IN_PROGRESS' });
      expect(engine.currentState().activePlayer).toBe('X');
    });

    it.each([
      [-1, 0],
      [0, -1],
      [0, 3],
      [1.5, 0],
    ])('rejects (%p, %p) as out of bounds', (row, column) => {
      const engine = new GameEngine(3);
      const error = captureError(() => engine.applyMove(row, column));
      expect(error).toBeInstanceOf(OutOfBoundsError);
    });

    it('rejects an occupied cell without changing board, player or phase', () => {
      const engine = new GameEngine(3);
      play(engine, [[1, 1], [0, 0]]);
      const before = engine.currentState();

      const error = captureError(() => engine.applyMove(1, 1));
      expect(error).toBeInstanceOf(CellOccupiedError);
      expect(error).toMatchObject({
        code: GameErrorCode.CELL_OCCUPIED,
        details: { row: 1, column: 1, occupant: 'X' },
      });
      expect(engine.currentState()).toBe(before);
      expect(engine.getMoveHistory()).toHaveLength(2);
    });

    it('rejects every move once the game is won', () => {
      const engine = new GameEngine(3);
      play(engine, [[0, 0], [1, 0], [0, 1], [1, 1], [0, 2]]);
      const before = engine.currentState();

      expect(() => engine.applyMove(2, 2)).toThrow(GameAlreadyOverError);
      expect(engine.currentState()).toBe(before);
    });

    it('reports game over before bounds or occupancy', () => {
      const engine = new GameEngine(3);
      play(engine, [[0, 0], [1, 0], [0, 1], [1, 1], [0, 2]]);

      expect(() => engine.applyMove(9, 9)).toThrow(GameAlreadyOverError);
      expect(() => engine.applyMove(0, 0)).toThrow(GameAlreadyOverError);
    });

    it('rejects moves after a draw', () => {
      const engine = new GameEngine(3);
      play(engine, [
        [0, 0], [0, 1], [0, 2], [1, 1], [1, 0],
        [1, 2], [2, 1], [2, 0], [2, 2],
      ]);

      const error = captureError(() => engine.applyMove(0, 0));
      expect(error).toBeInstanceOf(GameAlreadyOverError);
      expect(error).toMatchObject({ details: { status: 'draw' } });
    });
  });

  // ==========================================================================
  // Move History
  // ==========================================================================

  describe('getMoveHistory', () => {
    it('records successful moves in order', () => {
      const engine = new GameEngine(4);
      play(engine, [[3, 3], [0, 0]]);

      expect(engine.getMoveHistory()).toEqual([
        { row: 3, column: 3, player: 'X', moveNumber: 1 },
        { row: 0, column: 0, player: 'O', moveNumber: 2 },
      ]);
      expect(engine.getBoardSize()).toBe(4);
    });
  });
});
