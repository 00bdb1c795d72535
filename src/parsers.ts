import type { Board } from './Board.ts';

import { MalformedInputError } from './errors.ts';

const EMPTY_TOKENS: ReadonlySet<string> = new Set(['.', '_']);

export function formatBoard(board: Board): string {
  return board.rows().map((row) => row.join(' ')).join('\n');
}

export function parseCellToken(token: string): number {
  if (EMPTY_TOKENS.has(token)) {
    return 0;
  }
  if (!/^\d+$/.test(token)) {
    throw new MalformedInputError(`Bad cell value: ${token}`);
  }
  return parseInt(token, 10);
}

/**
 * Reads whitespace-separated cell tokens in row-major order. `0`, `.` and `_` are empty cells.
 */
export function parseGridText(text: string): number[] {
  const trimmed = text.trim();
  if (!trimmed) {
    return [];
  }
  return trimmed.split(/\s+/).map(parseCellToken);
}
