import {
  describe,
  expect,
  it
} from 'vitest';

import { Grid } from '../src/Grid.ts';
import { parseGrid } from '../src/parsers.ts';
import { CLASSIC_PUZZLE } from './sudokuTestHelper.ts';

describe('Grid', () => {
  describe('empty', () => {
    it('creates a grid of 81 empty cells', () => {
      const grid = Grid.empty();
      expect(grid.emptyCount).toBe(81);
      expect(grid.isComplete).toBe(false);
    });
  });

  describe('fromRows', () => {
    it('throws for the wrong number of rows', () => {
      expect(() => Grid.fromRows([[1, 2, 3]])).toThrow('Grid must have 9 rows, got 1');
    });

    it('throws for a short row', () => {
      const rows = Array.from({ length: 9 }, () => Array.from({ length: 9 }, () => 0));
      rows[4] = [1, 2];
      expect(() => Grid.fromRows(rows)).toThrow('Row 5 must have 9 cells, got 2');
    });

    it('throws for a value outside 0-9', () => {
      const rows = Array.from({ length: 9 }, () => Array.from({ length: 9 }, () => 0));
      rows[0] = [0, 0, 10, 0, 0, 0, 0, 0, 0];
      expect(() => Grid.fromRows(rows)).toThrow('Cell value at row 1, column 3 must be 0-9, got 10');
    });

    it('copies the rows it is given', () => {
      const rows = Array.from({ length: 9 }, () => Array.from({ length: 9 }, () => 0));
      const grid = Grid.fromRows(rows);
      rows[0] = [9, 9, 9, 9, 9, 9, 9, 9, 9];
      expect(grid.getValue({ column: 0, row: 0 })).toBe(0);
    });
  });

  describe('getValue and setValue', () => {
    it('reads a fixed digit', () => {
      const grid = parseGrid(CLASSIC_PUZZLE);
      expect(grid.getValue({ column: 1, row: 0 })).toBe(3);
      expect(grid.getValue({ column: 2, row: 0 })).toBe(0);
    });

    it('writes a value in place', () => {
      const grid = Grid.empty();
      grid.setValue({ column: 4, row: 6 }, 7);
      expect(grid.getValue({ column: 4, row: 6 })).toBe(7);
      expect(grid.emptyCount).toBe(80);
    });

    it('throws for positions off the board', () => {
      const grid = Grid.empty();
      expect(() => grid.getValue({ column: 0, row: 9 })).toThrow('Row 9 is out of range');
      expect(() => grid.getValue({ column: 9, row: 0 })).toThrow('Column 9 is out of range');
      expect(() => {
        grid.setValue({ column: 9, row: 0 }, 1);
      }).toThrow('Column 9 is out of range');
    });

    it('throws for a fractional column', () => {
      const grid = Grid.empty();
      expect(() => {
        grid.setValue({ column: 1.5, row: 0 }, 1);
      }).toThrow('Column 1.5 is out of range');
      expect(grid.toRows()[0]).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
    });
  });

  describe('getRow and getColumn', () => {
    it('returns the values of a row', () => {
      const grid = parseGrid(CLASSIC_PUZZLE);
      expect(grid.getRow(1)).toEqual([6, 0, 0, 1, 9, 5, 0, 0, 0]);
    });

    it('returns the values of a column', () => {
      const grid = parseGrid(CLASSIC_PUZZLE);
      expect(grid.getColumn(0)).toEqual([5, 6, 0, 8, 4, 7, 0, 0, 0]);
    });
  });

  describe('clone and equals', () => {
    it('creates an independent copy', () => {
      const grid = parseGrid(CLASSIC_PUZZLE);
      const copy = grid.clone();
      expect(copy.equals(grid)).toBe(true);
      copy.setValue({ column: 2, row: 0 }, 4);
      expect(copy.equals(grid)).toBe(false);
      expect(grid.getValue({ column: 2, row: 0 })).toBe(0);
    });
  });

  describe('toRows', () => {
    it('returns a deep copy', () => {
      const grid = Grid.empty();
      const rows = grid.toRows();
      rows[0]?.fill(5);
      expect(grid.getRow(0)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
    });
  });
});
