import {
  IndexOutOfBoundsError,
  MalformedInputError,
  SearchExhaustedError
} from './errors.ts';
import { isqrt } from './isqrt.ts';
import {
  formatBoard,
  parseGridText
} from './parsers.ts';
import {
  assertUnsignedInteger,
  ensureNonNullable,
  isUnsignedInteger
} from './typeGuards.ts';

export interface CellPosition {
  readonly column: number;
  readonly row: number;
}

/**
 * The N values of one row, column or sub-block.
 */
export type Section = readonly number[];

export interface SolveOptions {
  /**
   * Maximum number of search nodes to visit before giving up with {@link SearchExhaustedError}.
   * Unbounded when omitted.
   */
  readonly maxSteps?: number;
}

export interface SolveResult {
  readonly board: Board;
  readonly solved: boolean;
  readonly steps: number;
}

export const EMPTY_CELL = 0;

class StepBudget {
  public steps = 0;

  public constructor(private readonly maxSteps: number | undefined) {
  }

  public take(): void {
    this.steps++;
    if (this.maxSteps !== undefined && this.steps > this.maxSteps) {
      throw new SearchExhaustedError(this.maxSteps);
    }
  }
}

/**
 * An immutable N×N Sudoku grid stored row-major. `0` marks an empty cell.
 *
 * N must be a perfect square so the grid divides into √N × √N sub-blocks.
 * Nothing else about the contents is enforced: invalid grids, including values above N, are representable and reported by {@link Board.isValid}.
 */
export class Board {
  public readonly cells: readonly number[];
  public readonly side: number;

  public get emptyCount(): number {
    return this.cells.filter((value) => value === EMPTY_CELL).length;
  }

  public constructor(public readonly size: number, cells: readonly number[]) {
    if (!isUnsignedInteger(size)) {
      throw new MalformedInputError(`Board size must be a non-negative integer, got ${String(size)}`);
    }
    const side = isqrt(size);
    if (side === 0) {
      throw new MalformedInputError(`Board size ${String(size)} is not a perfect square greater than 1`);
    }
    if (cells.length !== size * size) {
      throw new MalformedInputError(`Expected ${String(size * size)} cells for a ${String(size)}x${String(size)} board, got ${String(cells.length)}`);
    }
    for (let i = 0; i < cells.length; i++) {
      const value = cells[i];
      if (!isUnsignedInteger(value)) {
        throw new MalformedInputError(`Cell ${String(i)} must be a non-negative integer, got ${String(value)}`);
      }
    }
    this.side = side;
    this.cells = Object.freeze([...cells]);
  }

  public static fromRows(rows: readonly (readonly number[])[]): Board {
    const size = rows.length;
    for (let x = 0; x < size; x++) {
      const row = ensureNonNullable(rows[x]);
      if (row.length !== size) {
        throw new MalformedInputError(`Row ${String(x + 1)} has ${String(row.length)} cells, expected ${String(size)}`);
      }
    }
    return new Board(size, rows.flat());
  }

  public static parse(text: string): Board {
    const cells = parseGridText(text);
    const size = isqrt(cells.length);
    if (size === 0) {
      throw new MalformedInputError(`Cannot infer a square board from ${String(cells.length)} cells`);
    }
    return new Board(size, cells);
  }

  public col(y: number): Section {
    this.assertIndex(0, y, this.size);
    const section: number[] = [];
    for (let x = 0; x < this.size; x++) {
      section.push(this.cellAt(x * this.size + y));
    }
    return section;
  }

  public colComplete(y: number): boolean {
    return sectionComplete(this.col(y));
  }

  public colValid(y: number): boolean {
    return sectionValid(this.col(y));
  }

  public equals(other: Board): boolean {
    return this.size === other.size && this.cells.every((value, i) => value === other.cells[i]);
  }

  public get(x: number, y: number): number {
    this.assertIndex(x, y, this.size);
    return this.cellAt(x * this.size + y);
  }

  /**
   * Whether no cell is empty. Says nothing about conflicts.
   */
  public isComplete(): boolean {
    return !this.cells.includes(EMPTY_CELL);
  }

  public isSolved(): boolean {
    return this.isValid() && this.isComplete();
  }

  /**
   * Whether no row, column or sub-block repeats a non-zero value or holds one above `size`. Says nothing about solvability.
   */
  public isValid(): boolean {
    for (let x = 0; x < this.size; x++) {
      if (!this.rowValid(x)) {
        return false;
      }
    }
    for (let y = 0; y < this.size; y++) {
      if (!this.colValid(y)) {
        return false;
      }
    }
    for (let bx = 0; bx < this.side; bx++) {
      for (let by = 0; by < this.side; by++) {
        if (!this.quadrantValid(bx, by)) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * The first empty cell in row-major order, or `null` when the board is full.
   */
  public next(): CellPosition | null {
    const index = this.cells.indexOf(EMPTY_CELL);
    if (index < 0) {
      return null;
    }
    return { column: index % this.size, row: Math.floor(index / this.size) };
  }

  public put(x: number, y: number, value: number): Board {
    this.assertIndex(x, y, this.size);
    if (!isUnsignedInteger(value)) {
      throw new MalformedInputError(`Cell value must be a non-negative integer, got ${String(value)}`);
    }
    const cells = [...this.cells];
    cells[x * this.size + y] = value;
    return new Board(this.size, cells);
  }

  /**
   * Reads the sub-block at block coordinates `(bx, by)`, each in `[0, side)`.
   * The block starts at flat offset `side * (bx * size + by)`, i.e. board row `bx * side`, column `by * side`,
   * and is read out row by row.
   */
  public quadrant(bx: number, by: number): Section {
    this.assertIndex(bx, by, this.side);
    const origin = this.side * (bx * this.size + by);
    const section: number[] = [];
    for (let i = 0; i < this.side; i++) {
      for (let j = 0; j < this.side; j++) {
        section.push(this.cellAt(origin + i * this.size + j));
      }
    }
    return section;
  }

  public quadrantComplete(bx: number, by: number): boolean {
    return sectionComplete(this.quadrant(bx, by));
  }

  public quadrantValid(bx: number, by: number): boolean {
    return sectionValid(this.quadrant(bx, by));
  }

  public row(x: number): Section {
    this.assertIndex(x, 0, this.size);
    return this.cells.slice(x * this.size, (x + 1) * this.size);
  }

  public rowComplete(x: number): boolean {
    return sectionComplete(this.row(x));
  }

  public rows(): Section[] {
    return Array.from({ length: this.size }, (_, x) => this.row(x));
  }

  public rowValid(x: number): boolean {
    return sectionValid(this.row(x));
  }

  /**
   * Depth-first backtracking over the empty cells in row-major order, trying values `1..size` ascending.
   *
   * Returns the first complete and valid board reached. A board that is already invalid, already full,
   * or has no solution is returned as is; check {@link Board.isSolved} on the result.
   */
  public solve(options: SolveOptions = {}): Board {
    return this.search(createBudget(options));
  }

  public solveWithStats(options: SolveOptions = {}): SolveResult {
    const budget = createBudget(options);
    const board = this.search(budget);
    return { board, solved: board.isSolved(), steps: budget.steps };
  }

  public toString(): string {
    return formatBoard(this);
  }

  private assertIndex(x: number, y: number, limit: number): void {
    if (!isUnsignedInteger(x) || !isUnsignedInteger(y) || x >= limit || y >= limit) {
      throw new IndexOutOfBoundsError(x, y, limit);
    }
  }

  private cellAt(index: number): number {
    return ensureNonNullable(this.cells[index]);
  }

  private search(budget: StepBudget): Board {
    budget.take();
    if (!this.isValid()) {
      return this;
    }

    const position = this.next();
    if (position === null) {
      return this;
    }

    for (let value = 1; value <= this.size; value++) {
      const result = this.put(position.row, position.column, value).search(budget);
      if (result.isComplete() && result.isValid()) {
        return result;
      }
    }

    return this;
  }
}

/**
 * Whether the section is free of empty cells.
 */
export function sectionComplete(section: Section): boolean {
  return !section.includes(EMPTY_CELL);
}

/**
 * Whether every non-zero value lies in `1..section.length` and occurs once. Empty cells never conflict.
 */
export function sectionValid(section: Section): boolean {
  const seen = new Set<number>();
  for (const value of section) {
    if (value === EMPTY_CELL) {
      continue;
    }
    if (value > section.length || seen.has(value)) {
      return false;
    }
    seen.add(value);
  }
  return true;
}

function createBudget(options: SolveOptions): StepBudget {
  if (options.maxSteps !== undefined) {
    assertUnsignedInteger(options.maxSteps, new MalformedInputError(`maxSteps must be a non-negative integer, got ${String(options.maxSteps)}`));
  }
  return new StepBudget(options.maxSteps);
}
