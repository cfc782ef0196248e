import { existsSync } from 'node:fs';

import type { PuzzleSpec } from './puzzleFile.ts';

import { loadPuzzleFile } from './puzzleFile.ts';
import {
  formatOutcome,
  solvePuzzleSpec
} from './solvePuzzles.ts';

export interface CliResult {
  readonly errors: readonly string[];
  readonly exitCode: number;
  readonly output: readonly string[];
}

export const NO_VALIDATE_FLAG = '--no-validate';
export const USAGE = `Usage: npm run solveSudoku -- <puzzle digits | puzzle.yaml> [${NO_VALIDATE_FLAG}]`;

export function runCli(args: readonly string[]): CliResult {
  const skipValidation = args.includes(NO_VALIDATE_FLAG);
  const positional = args.filter((arg) => arg !== NO_VALIDATE_FLAG);
  const input = positional[0];
  if (input === undefined || positional.length > 1) {
    return fail(USAGE);
  }

  let specs: PuzzleSpec[];
  if (existsSync(input)) {
    try {
      specs = loadPuzzleFile(input);
    } catch (error: unknown) {
      return fail(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
  } else if (/\.ya?ml$/i.test(input)) {
    return fail(`Error: ${input} not found`);
  } else {
    specs = [{ grid: input, name: 'puzzle', validate: true }];
  }

  const output: string[] = [];
  let failed = false;
  for (const spec of specs) {
    const outcome = solvePuzzleSpec(skipValidation ? { ...spec, validate: false } : spec);
    output.push(formatOutcome(outcome));
    if (outcome.type !== 'solved') {
      failed = true;
    }
  }
  return { errors: [], exitCode: failed ? 1 : 0, output };
}

function fail(message: string): CliResult {
  return { errors: [message], exitCode: 1, output: [] };
}
