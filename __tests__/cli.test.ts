import {
  dirname,
  join
} from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  describe,
  expect,
  it
} from 'vitest';

import {
  runCli,
  USAGE
} from '../src/cli.ts';
import {
  formatGrid,
  parseGrid
} from '../src/parsers.ts';
import {
  CLASSIC_PUZZLE,
  CLASSIC_SOLUTION,
  DEAD_END_PUZZLE
} from './sudokuTestHelper.ts';

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');
const CLASSIC_SOLUTION_TEXT = formatGrid(parseGrid(CLASSIC_SOLUTION));

describe('runCli', () => {
  it('solves puzzle digits given inline', () => {
    expect(runCli([CLASSIC_PUZZLE])).toEqual({
      errors: [],
      exitCode: 0,
      output: [`# puzzle\n${CLASSIC_SOLUTION_TEXT}`]
    });
  });

  it('loads an existing file as a puzzle file', () => {
    expect(runCli([join(FIXTURES, 'single.yaml')])).toEqual({
      errors: [],
      exitCode: 0,
      output: [`# single\n${CLASSIC_SOLUTION_TEXT}`]
    });
  });

  it('exits with 1 when any puzzle in a file has no solution', () => {
    expect(runCli([join(FIXTURES, 'collection.yaml')])).toEqual({
      errors: [],
      exitCode: 1,
      output: [`# classic\n${CLASSIC_SOLUTION_TEXT}`, '# puzzle-2\nNo solution\n']
    });
  });

  it('exits with 1 for an invalid puzzle', () => {
    expect(runCli([DEAD_END_PUZZLE])).toEqual({
      errors: [],
      exitCode: 1,
      output: ['# puzzle\nInvalid puzzle: Conflicting fixed digits: Digit 9 repeats in Row 8: F8, I8\n']
    });
  });

  it('turns validation off with --no-validate', () => {
    expect(runCli(['--no-validate', DEAD_END_PUZZLE])).toEqual({
      errors: [],
      exitCode: 1,
      output: ['# puzzle\nNo solution\n']
    });
  });

  it('reports a missing puzzle file instead of reading its name as digits', () => {
    expect(runCli(['puzles/samples.yaml'])).toEqual({
      errors: ['Error: puzles/samples.yaml not found'],
      exitCode: 1,
      output: []
    });
  });

  it('reports a malformed puzzle file', () => {
    expect(runCli([join(FIXTURES, 'empty-list.yaml')])).toEqual({
      errors: ['Error: puzzles must be a non-empty list'],
      exitCode: 1,
      output: []
    });
  });

  it('prints usage without a puzzle argument', () => {
    expect(runCli([])).toEqual({ errors: [USAGE], exitCode: 1, output: [] });
    expect(runCli(['--no-validate'])).toEqual({ errors: [USAGE], exitCode: 1, output: [] });
  });

  it('prints usage for more than one puzzle argument', () => {
    expect(runCli([CLASSIC_PUZZLE, CLASSIC_PUZZLE])).toEqual({ errors: [USAGE], exitCode: 1, output: [] });
  });
});
