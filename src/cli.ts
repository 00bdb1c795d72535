import type { SolveOptions } from './Board.ts';

import {
  basename,
  extname
} from 'node:path';

import { SudokuError } from './errors.ts';
import { formatBoard } from './parsers.ts';
import {
  loadPuzzleSpec,
  puzzleSpecToBoard
} from './puzzleSpec.ts';

export interface CliOptions {
  readonly maxSteps?: number;
  readonly puzzlePath: string;
}

export interface CliOutput {
  error(message: string): void;
  log(message: string): void;
}

export interface PuzzleSource {
  exists(path: string): boolean;
  read(path: string): string;
}

export enum ExitCode {
  Solved = 0,
  Unsolved = 1
}

export const USAGE = 'Usage: npm run solve -- [puzzle.yaml] [--max-steps N]';

const MAX_STEPS_FLAG = '--max-steps';

export function parseCliArgs(args: readonly string[], defaultPuzzlePath: string): CliOptions {
  let puzzlePath: string | undefined;
  let maxSteps: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === MAX_STEPS_FLAG) {
      i++;
      const value = args[i];
      if (value === undefined || !/^\d+$/.test(value)) {
        throw new SudokuError(`${MAX_STEPS_FLAG} expects a non-negative integer`);
      }
      maxSteps = parseInt(value, 10);
    } else if (arg?.startsWith('--')) {
      throw new SudokuError(`Unknown option: ${arg}`);
    } else if (puzzlePath === undefined) {
      puzzlePath = arg;
    } else {
      throw new SudokuError(`Unexpected argument: ${String(arg)}`);
    }
  }

  return {
    puzzlePath: puzzlePath ?? defaultPuzzlePath,
    ...maxSteps !== undefined && { maxSteps }
  };
}

/**
 * Loads, solves and prints one puzzle. Returns the process exit code: {@link ExitCode.Solved} only when the result is solved.
 */
export function runSolver(options: CliOptions, source: PuzzleSource, output: CliOutput): ExitCode {
  try {
    if (!source.exists(options.puzzlePath)) {
      throw new SudokuError(`${options.puzzlePath} not found`);
    }
    const spec = loadPuzzleSpec(readPuzzle(source, options.puzzlePath), basename(options.puzzlePath, extname(options.puzzlePath)));
    const board = puzzleSpecToBoard(spec);

    output.log(spec.meta ? `${spec.title} (${spec.meta})` : spec.title);
    output.log(formatBoard(board));
    output.log('');

    const solveOptions: SolveOptions = options.maxSteps !== undefined ? { maxSteps: options.maxSteps } : {};
    const result = board.solveWithStats(solveOptions);
    output.log(formatBoard(result.board));
    output.log('');
    output.log(`${result.solved ? 'Solved' : 'No solution found'} after ${String(result.steps)} steps`);
    return result.solved ? ExitCode.Solved : ExitCode.Unsolved;
  } catch (error: unknown) {
    if (error instanceof SudokuError) {
      output.error(`Error: ${error.message}`);
      return ExitCode.Unsolved;
    }
    throw error;
  }
}

function readPuzzle(source: PuzzleSource, path: string): string {
  try {
    return source.read(path);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SudokuError(`Cannot read ${path}: ${reason}`);
  }
}
