import type { Position } from './Position.ts';

import {
  ensureNonNullable,
  isCellValue
} from './typeGuards.ts';

/* eslint-disable no-magic-numbers -- Digit literals. */
export type CellValue = 0 | Digit;

export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const BOX_SIZE = 3;
export const EMPTY_CELL = 0;
export const GRID_SIZE = 9;

export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];
/* eslint-enable no-magic-numbers -- End digit literals. */

export class Grid {
  public get emptyCount(): number {
    let count = 0;
    for (const row of this.cells) {
      for (const value of row) {
        if (value === EMPTY_CELL) {
          count++;
        }
      }
    }
    return count;
  }

  public get isComplete(): boolean {
    return this.emptyCount === 0;
  }

  private constructor(private readonly cells: CellValue[][]) {
  }

  public static empty(): Grid {
    return new Grid(Array.from({ length: GRID_SIZE }, () => Array.from({ length: GRID_SIZE }, (): CellValue => EMPTY_CELL)));
  }

  public static fromRows(rows: readonly (readonly number[])[]): Grid {
    if (rows.length !== GRID_SIZE) {
      throw new Error(`Grid must have ${String(GRID_SIZE)} rows, got ${String(rows.length)}`);
    }
    const cells = rows.map((row, rowIndex) => {
      if (row.length !== GRID_SIZE) {
        throw new Error(`Row ${String(rowIndex + 1)} must have ${String(GRID_SIZE)} cells, got ${String(row.length)}`);
      }
      return row.map((value, columnIndex) => {
        if (!isCellValue(value)) {
          throw new Error(`Cell value at row ${String(rowIndex + 1)}, column ${String(columnIndex + 1)} must be 0-9, got ${String(value)}`);
        }
        return value;
      });
    });
    return new Grid(cells);
  }

  public clone(): Grid {
    return new Grid(this.toRows());
  }

  public equals(other: Grid): boolean {
    return this.cells.every((row, rowIndex) => {
      const otherRow = other.getRow(rowIndex);
      return row.every((value, columnIndex) => value === otherRow[columnIndex]);
    });
  }

  public getColumn(column: number): readonly CellValue[] {
    return this.cells.map((row) => ensureNonNullable(row[column], `Column ${String(column)} is out of range`));
  }

  public getRow(row: number): readonly CellValue[] {
    return ensureNonNullable(this.cells[row], `Row ${String(row)} is out of range`);
  }

  public getValue(position: Position): CellValue {
    return ensureNonNullable(this.getRow(position.row)[position.column], `Column ${String(position.column)} is out of range`);
  }

  public setValue(position: Position, value: CellValue): void {
    const row = ensureNonNullable(this.cells[position.row], `Row ${String(position.row)} is out of range`);
    if (!Number.isInteger(position.column) || position.column < 0 || position.column >= GRID_SIZE) {
      throw new Error(`Column ${String(position.column)} is out of range`);
    }
    row[position.column] = value;
  }

  public toRows(): CellValue[][] {
    return this.cells.map((row) => [...row]);
  }
}
