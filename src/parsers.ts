import type { Position } from './Position.ts';

import { InvalidInputFormatError } from './errors.ts';
import {
  Grid,
  GRID_SIZE
} from './Grid.ts';

const CELL_COUNT = GRID_SIZE * GRID_SIZE;
const CHAR_CODE_A = 65;

export function formatGrid(grid: Grid): string {
  return grid.toRows().map((row) => `${row.join(' ')}\n`).join('');
}

export function getCellRef(position: Position): string {
  return String.fromCharCode(CHAR_CODE_A + position.column) + String(position.row + 1);
}

export function parseGrid(text: string): Grid {
  if (text.length !== CELL_COUNT) {
    throw new InvalidInputFormatError(`Expected ${String(CELL_COUNT)} digits, got ${String(text.length)}`, text);
  }
  const badIndex = text.search(/\D/);
  if (badIndex >= 0) {
    throw new InvalidInputFormatError(`Invalid character '${String.fromCodePoint(text.codePointAt(badIndex) ?? 0)}' at index ${String(badIndex)}`, text);
  }
  const rows: number[][] = [];
  for (let start = 0; start < CELL_COUNT; start += GRID_SIZE) {
    rows.push(Array.from(text.slice(start, start + GRID_SIZE), (ch) => parseInt(ch, 10)));
  }
  return Grid.fromRows(rows);
}

export function serializeGrid(grid: Grid): string {
  return grid.toRows().map((row) => row.join('')).join('');
}
