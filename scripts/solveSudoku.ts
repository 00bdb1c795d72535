/**
 * Solve a Sudoku puzzle from a YAML file by backtracking and print the result.
 *
 * Usage:
 *     npm run solve -- [puzzles/expert.yaml] [--max-steps N]
 *
 * Exits with 0 when the puzzle was solved, 1 otherwise.
 */

/* eslint-disable no-console -- CLI script output. */

import {
  existsSync,
  readFileSync
} from 'node:fs';
import {
  dirname,
  join,
  resolve
} from 'node:path';
import { fileURLToPath } from 'node:url';

import type { CliOptions } from '../src/cli.ts';

import {
  parseCliArgs,
  runSolver,
  USAGE
} from '../src/cli.ts';
import { SudokuError } from '../src/errors.ts';

const FIRST_CLI_ARG_INDEX = 2;

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');
const DEFAULT_PUZZLE = join(ROOT, 'puzzles', 'expert.yaml');

function main(): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(FIRST_CLI_ARG_INDEX), DEFAULT_PUZZLE);
  } catch (error: unknown) {
    if (error instanceof SudokuError) {
      console.error(`Error: ${error.message}`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  return runSolver(
    options,
    {
      exists: existsSync,
      read: (path) => readFileSync(path, 'utf-8')
    },
    {
      error: (message) => {
        console.error(message);
      },
      log: (message) => {
        console.log(message);
      }
    }
  );
}

process.exit(main());

/* eslint-enable no-console -- End CLI script output. */
