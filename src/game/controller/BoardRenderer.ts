/**
 * BoardRenderer.ts
 * Text rendering of a board for the console
 *
 *     1   2   3
 *   ┌───┬───┬───┐
 * 1 │ X │ - │ - │
 *   ├───┼───┼───┤
 *   ...
 *   └───┴───┴───┘
 *
 * Row and column labels are 1-based, matching what the player types.
 */

import { Board, getRows } from '../engine/Board';
import { formatCell } from '../engine/Mark';

function border(size: number, left: string, middle: string, right: string): string {
  return `  ${left}${`───${middle}`.repeat(size - 1)}───${right}`;
}

/**
 * Render a board as lines of text, without trailing newlines
 */
export function renderBoard(board: Board): string[] {
  const { size } = board;
  const labels = Array.from({ length: size }, (_, i) => String(i + 1));
  const lines: string[] = [`    ${labels.join('   ')}`, border(size, '┌', '┬', '┐')];

  getRows(board).forEach((row, rowIndex) => {
    lines.push(`${rowIndex + 1} │${row.map(cell => ` ${formatCell(cell)} │`).join('')}`);
    if (rowIndex < size - 1) {
      lines.push(border(size, '├', '┼', '┤'));
    }
  });

  lines.push(border(size, '└', '┴', '┘'));
  return lines;
}
