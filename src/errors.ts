export class SudokuError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'SudokuError';
  }
}

/**
 * Thrown for a board or puzzle definition that cannot describe an N×N grid:
 * a wrong cell count, a size that is not a perfect square, or a cell that is not a non-negative integer.
 */
export class MalformedInputError extends SudokuError {
  public constructor(message: string) {
    super(message);
    this.name = 'MalformedInputError';
  }
}

export class IndexOutOfBoundsError extends SudokuError {
  public constructor(public readonly row: number, public readonly column: number, limit: number) {
    super(`Position (${String(row)}, ${String(column)}) is outside a ${String(limit)}x${String(limit)} grid`);
    this.name = 'IndexOutOfBoundsError';
  }
}

/**
 * Thrown when a search visits more nodes than its `maxSteps` budget allows.
 */
export class SearchExhaustedError extends SudokuError {
  public constructor(public readonly maxSteps: number) {
    super(`Search exceeded its budget of ${String(maxSteps)} steps`);
    this.name = 'SearchExhaustedError';
  }
}
