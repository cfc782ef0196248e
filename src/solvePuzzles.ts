import type { PuzzleSpec } from './puzzleFile.ts';

import {
  ConflictingFixedDigitsError,
  InvalidInputFormatError
} from './errors.ts';
import { Sudoku } from './Sudoku.ts';

export type PuzzleOutcome = InvalidOutcome | SolvedOutcome | UnsolvableOutcome;

interface InvalidOutcome {
  readonly message: string;
  readonly name: string;
  readonly type: 'invalid';
}

interface SolvedOutcome {
  readonly name: string;
  readonly sudoku: Sudoku;
  readonly type: 'solved';
}

interface UnsolvableOutcome {
  readonly name: string;
  readonly sudoku: Sudoku;
  readonly type: 'unsolvable';
}

export function formatOutcome(outcome: PuzzleOutcome): string {
  const header = `# ${outcome.name}\n`;
  switch (outcome.type) {
    case 'invalid':
      return `${header}Invalid puzzle: ${outcome.message}\n`;
    case 'solved':
      return header + outcome.sudoku.toString();
    case 'unsolvable':
      return `${header}No solution\n`;
    default: {
      const exhaustive: never = outcome;
      throw new Error(`Unknown outcome type: ${String(exhaustive)}`);
    }
  }
}

export function solvePuzzleSpec(spec: PuzzleSpec): PuzzleOutcome {
  let sudoku: Sudoku;
  try {
    sudoku = new Sudoku(spec.grid, { validate: spec.validate });
  } catch (error: unknown) {
    if (error instanceof InvalidInputFormatError || error instanceof ConflictingFixedDigitsError) {
      return { message: error.message, name: spec.name, type: 'invalid' };
    }
    throw error;
  }
  return { name: spec.name, sudoku, type: sudoku.solve() ? 'solved' : 'unsolvable' };
}
