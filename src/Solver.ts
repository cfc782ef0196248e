import type {
  Digit,
  Grid
} from './Grid.ts';
import type { Position } from './Position.ts';

import {
  BOX_SIZE,
  DIGITS,
  EMPTY_CELL,
  GRID_SIZE
} from './Grid.ts';
import {
  FIRST_POSITION,
  getBoxOrigin,
  nextPosition
} from './Position.ts';

export function isValidGuess(grid: Grid, position: Position, guess: Digit): boolean {
  for (let column = 0; column < GRID_SIZE; column++) {
    if (grid.getValue({ column, row: position.row }) === guess) {
      return false;
    }
  }

  for (let row = 0; row < GRID_SIZE; row++) {
    if (grid.getValue({ column: position.column, row }) === guess) {
      return false;
    }
  }

  const origin = getBoxOrigin(position);
  for (let row = origin.row; row < origin.row + BOX_SIZE; row++) {
    for (let column = origin.column; column < origin.column + BOX_SIZE; column++) {
      if (grid.getValue({ column, row }) === guess) {
        return false;
      }
    }
  }
  return true;
}

/**
 * On failure the grid is left exactly as it was passed in.
 */
export function solve(grid: Grid): boolean {
  return solveFrom(grid, FIRST_POSITION);
}

function solveFrom(grid: Grid, position: Position): boolean {
  if (grid.getValue(position) !== EMPTY_CELL) {
    const next = nextPosition(position);
    return next === null || solveFrom(grid, next);
  }

  for (const guess of DIGITS) {
    if (!isValidGuess(grid, position, guess)) {
      continue;
    }
    grid.setValue(position, guess);
    const next = nextPosition(position);
    if (next === null || solveFrom(grid, next)) {
      return true;
    }
    grid.setValue(position, EMPTY_CELL);
  }
  return false;
}
