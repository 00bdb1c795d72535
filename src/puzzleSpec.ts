import yaml from 'js-yaml';

import { Board } from './Board.ts';
import { MalformedInputError } from './errors.ts';
import { parseGridText } from './parsers.ts';
import { isUnsignedInteger } from './typeGuards.ts';

/**
 * A puzzle as read from a YAML file:
 *
 * ```yaml
 * title: Expert
 * size: 9
 * rows:
 *   - 5 0 0 9 0 0 8 0 0
 *   - [0, 0, 7, 0, 0, 2, 0, 0, 0]
 *   ...
 * ```
 */
export interface PuzzleSpec {
  readonly meta?: string;
  readonly rows: readonly (readonly number[])[];
  readonly size: number;
  readonly title: string;
}

export function loadPuzzleSpec(content: string, defaultTitle = 'Untitled'): PuzzleSpec {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedInputError(`Puzzle file is not valid YAML: ${reason}`);
  }
  return parsePuzzleSpec(raw, defaultTitle);
}

export function parsePuzzleSpec(raw: unknown, defaultTitle = 'Untitled'): PuzzleSpec {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new MalformedInputError('Puzzle spec must be a mapping');
  }
  const fields: ReadonlyMap<string, unknown> = new Map(Object.entries(raw));

  const rowsRaw = fields.get('rows');
  if (!Array.isArray(rowsRaw) || rowsRaw.length === 0) {
    throw new MalformedInputError('Puzzle spec must have a non-empty "rows" list');
  }
  const rows = rowsRaw.map((row: unknown, i) => parseRow(row, i + 1));

  const size = fields.get('size') ?? rows.length;
  if (typeof size !== 'number') {
    throw new MalformedInputError(`"size" must be a number, got ${typeof size}`);
  }
  if (size !== rows.length) {
    throw new MalformedInputError(`Puzzle declares size ${String(size)} but has ${String(rows.length)} rows`);
  }

  const title = fields.get('title') ?? defaultTitle;
  if (typeof title !== 'string') {
    throw new MalformedInputError('"title" must be a string');
  }

  const meta = fields.get('meta');
  if (meta !== undefined && typeof meta !== 'string') {
    throw new MalformedInputError('"meta" must be a string');
  }

  return {
    rows,
    size: rows.length,
    title: title.trim(),
    ...meta !== undefined && { meta: meta.trim() }
  };
}

export function puzzleSpecToBoard(spec: PuzzleSpec): Board {
  return Board.fromRows(spec.rows);
}

function parseRow(row: unknown, rowId: number): number[] {
  if (typeof row === 'string') {
    return parseGridText(row);
  }
  if (!Array.isArray(row)) {
    throw new MalformedInputError(`Row ${String(rowId)} must be a string or a list of numbers`);
  }
  return row.map((value: unknown) => {
    if (!isUnsignedInteger(value)) {
      throw new MalformedInputError(`Row ${String(rowId)} has a bad cell value: ${String(value)}`);
    }
    return value;
  });
}
