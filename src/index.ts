export type {
  CellPosition,
  Section,
  SolveOptions,
  SolveResult
} from './Board.ts';
export type { PuzzleSpec } from './puzzleSpec.ts';

export {
  Board,
  EMPTY_CELL,
  sectionComplete,
  sectionValid
} from './Board.ts';
export {
  IndexOutOfBoundsError,
  MalformedInputError,
  SearchExhaustedError,
  SudokuError
} from './errors.ts';
export { isqrt } from './isqrt.ts';
export {
  formatBoard,
  parseCellToken,
  parseGridText
} from './parsers.ts';
export {
  loadPuzzleSpec,
  parsePuzzleSpec,
  puzzleSpecToBoard
} from './puzzleSpec.ts';
