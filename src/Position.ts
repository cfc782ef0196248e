import {
  BOX_SIZE,
  GRID_SIZE
} from './Grid.ts';

export interface Position {
  readonly column: number;
  readonly row: number;
}

export const FIRST_POSITION: Position = { column: 0, row: 0 };

export function comparePositions(a: Position, b: Position): number {
  return a.row - b.row || a.column - b.column;
}

export function getBoxOrigin(position: Position): Position {
  return {
    column: Math.floor(position.column / BOX_SIZE) * BOX_SIZE,
    row: Math.floor(position.row / BOX_SIZE) * BOX_SIZE
  };
}

export function nextPosition(position: Position): null | Position {
  const column = (position.column + 1) % GRID_SIZE;
  if (column !== 0) {
    return { column, row: position.row };
  }
  const row = position.row + 1;
  if (row === GRID_SIZE) {
    return null;
  }
  return { column, row };
}
