import {
  describe,
  expect,
  it
} from 'vitest';

import { MalformedInputError } from '../src/errors.ts';
import {
  loadPuzzleSpec,
  parsePuzzleSpec,
  puzzleSpecToBoard
} from '../src/puzzleSpec.ts';
import { readPuzzleFile } from './boardTestHelper.ts';

describe('loadPuzzleSpec', () => {
  it('reads rows written as text', () => {
    const spec = loadPuzzleSpec(readPuzzleFile('expert.yaml'));
    expect(spec.title).toBe('Expert');
    expect(spec.meta).toBe('extremesudoku.info expert level');
    expect(spec.size).toBe(9);
    expect(spec.rows).toHaveLength(9);
    expect(spec.rows[0]).toEqual([5, 0, 0, 9, 0, 0, 8, 0, 0]);
    expect(spec.rows[8]).toEqual([0, 0, 6, 0, 0, 3, 0, 0, 2]);
  });

  it('reads rows written as number lists', () => {
    const spec = loadPuzzleSpec(readPuzzleFile('small.yaml'));
    expect(spec.title).toBe('Small');
    expect(spec.meta).toBeUndefined();
    expect(spec.rows).toEqual([
      [1, 0, 0, 4],
      [0, 4, 1, 0],
      [2, 0, 0, 3],
      [0, 3, 2, 0]
    ]);
  });

  it('falls back to the default title', () => {
    const spec = loadPuzzleSpec('rows:\n  - 1 2 3 4\n  - 3 4 1 2\n  - 2 1 4 3\n  - 4 3 2 1\n', 'tiny');
    expect(spec.title).toBe('tiny');
    expect(spec.size).toBe(4);
  });

  it('wraps YAML syntax errors', () => {
    expect(() => loadPuzzleSpec('rows: [1, 2')).toThrow(MalformedInputError);
  });
});

describe('parsePuzzleSpec', () => {
  it('requires a mapping', () => {
    expect(() => parsePuzzleSpec(['1 2'])).toThrow('Puzzle spec must be a mapping');
    expect(() => parsePuzzleSpec(null)).toThrow('Puzzle spec must be a mapping');
  });

  it('requires a non-empty rows list', () => {
    expect(() => parsePuzzleSpec({ rows: [] })).toThrow('Puzzle spec must have a non-empty "rows" list');
    expect(() => parsePuzzleSpec({ title: 'x' })).toThrow(MalformedInputError);
  });

  it('checks the declared size against the rows', () => {
    expect(() => parsePuzzleSpec({ rows: ['1 2', '2 1'], size: 4 })).toThrow('Puzzle declares size 4 but has 2 rows');
  });

  it('requires a numeric size', () => {
    expect(() => parsePuzzleSpec({ rows: ['1 2 3 4', '3 4 1 2', '2 1 4 3', '4 3 2 1'], size: '4' })).toThrow('"size" must be a number, got string');
  });

  it('rejects bad cell values and row shapes', () => {
    expect(() => parsePuzzleSpec({ rows: [[1, -2]] })).toThrow('Row 1 has a bad cell value: -2');
    expect(() => parsePuzzleSpec({ rows: ['1 2', { a: 1 }] })).toThrow('Row 2 must be a string or a list of numbers');
    expect(() => parsePuzzleSpec({ rows: ['1 x'] })).toThrow('Bad cell value: x');
  });

  it('rejects non-string title and meta', () => {
    expect(() => parsePuzzleSpec({ rows: ['1'], title: 5 })).toThrow('"title" must be a string');
    expect(() => parsePuzzleSpec({ meta: [], rows: ['1'] })).toThrow('"meta" must be a string');
  });
});

describe('puzzleSpecToBoard', () => {
  it('builds a board of the spec size', () => {
    const board = puzzleSpecToBoard(loadPuzzleSpec(readPuzzleFile('small.yaml')));
    expect(board.size).toBe(4);
    expect(board.get(1, 2)).toBe(1);
  });

  it('rejects ragged rows', () => {
    const spec = parsePuzzleSpec({ rows: ['1 2 3 4', '3 4 1', '2 1 4 3', '4 3 2 1'] });
    expect(() => puzzleSpecToBoard(spec)).toThrow('Row 2 has 3 cells, expected 4');
  });

  it('rejects sizes without square sub-blocks', () => {
    const spec = parsePuzzleSpec({ rows: ['1 2', '2 1'] });
    expect(() => puzzleSpecToBoard(spec)).toThrow('Board size 2 is not a perfect square greater than 1');
  });
});
