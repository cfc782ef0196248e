import type { Grid } from './Grid.ts';

import {
  formatGrid,
  parseGrid
} from './parsers.ts';
import { solve } from './Solver.ts';
import { assertNoConflicts } from './validation.ts';

export interface SudokuOptions {
  readonly validate?: boolean;
}

export class Sudoku {
  public get grid(): Grid {
    return this._grid;
  }

  private readonly _grid: Grid;

  public constructor(text: string, options: SudokuOptions = {}) {
    this._grid = parseGrid(text);
    if (options.validate ?? true) {
      assertNoConflicts(this._grid);
    }
  }

  public solve(): boolean {
    return solve(this._grid);
  }

  public toString(): string {
    return formatGrid(this._grid);
  }
}
