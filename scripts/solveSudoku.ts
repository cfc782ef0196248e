/**
 * Solve a Sudoku puzzle given inline or as a YAML puzzle file.
 *
 * Usage:
 *     npm run solveSudoku -- 530070000600195000098000060800060003400803001700020006060000280000419005000080079
 *     npm run solveSudoku -- puzzles/samples.yaml
 *     npm run solveSudoku -- puzzles/samples.yaml --no-validate
 *
 * An argument naming an existing file is read as a puzzle file; anything else
 * is taken as the 81 puzzle digits, row by row, with 0 for blanks.
 */

/* eslint-disable no-console -- CLI script output. */

import { runCli } from '../src/cli.ts';

const FIRST_CLI_ARG_INDEX = 2;

function main(): void {
  const result = runCli(process.argv.slice(FIRST_CLI_ARG_INDEX));
  for (const line of result.output) {
    console.log(line);
  }
  for (const line of result.errors) {
    console.error(line);
  }
  process.exitCode = result.exitCode;
}

main();

/* eslint-enable no-console -- End CLI script output. */
