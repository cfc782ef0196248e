import type {
  Digit,
  Grid
} from './Grid.ts';
import type { Position } from './Position.ts';

import { ConflictingFixedDigitsError } from './errors.ts';
import {
  BOX_SIZE,
  DIGITS,
  EMPTY_CELL,
  GRID_SIZE
} from './Grid.ts';
import { getCellRef } from './parsers.ts';

export interface Conflict {
  readonly digit: Digit;
  readonly house: House;
  readonly positions: readonly Position[];
}

export type HouseType = 'box' | 'column' | 'row';

const CHAR_CODE_A = 65;

export class House {
  public readonly label: string;

  public constructor(public readonly type: HouseType, public readonly id: number, public readonly positions: readonly Position[]) {
    this.label = type === 'column' ? String.fromCharCode(CHAR_CODE_A + id - 1) : String(id);
  }

  public toString(): string {
    return `${HOUSE_TITLES[this.type]} ${this.label}`;
  }
}

const HOUSE_TITLES: Record<HouseType, string> = {
  box: 'Box',
  column: 'Column',
  row: 'Row'
};

export function assertNoConflicts(grid: Grid): void {
  const conflicts = findConflicts(grid);
  if (conflicts.length > 0) {
    throw new ConflictingFixedDigitsError(`Conflicting fixed digits: ${conflicts.map(describeConflict).join('; ')}`, conflicts);
  }
}

export function describeConflict(conflict: Conflict): string {
  return `Digit ${String(conflict.digit)} repeats in ${conflict.house.toString()}: ${conflict.positions.map(getCellRef).join(', ')}`;
}

export function findConflicts(grid: Grid): Conflict[] {
  const conflicts: Conflict[] = [];
  for (const house of getHouses()) {
    const positionsByDigit = new Map<Digit, Position[]>();
    for (const position of house.positions) {
      const value = grid.getValue(position);
      if (value === EMPTY_CELL) {
        continue;
      }
      const positions = positionsByDigit.get(value) ?? [];
      positions.push(position);
      positionsByDigit.set(value, positions);
    }
    for (const digit of DIGITS) {
      const positions = positionsByDigit.get(digit);
      if (positions && positions.length > 1) {
        conflicts.push({ digit, house, positions });
      }
    }
  }
  return conflicts;
}

let houses: null | readonly House[] = null;

export function getHouses(): readonly House[] {
  if (!houses) {
    const result: House[] = [];
    for (let row = 0; row < GRID_SIZE; row++) {
      result.push(new House('row', row + 1, Array.from({ length: GRID_SIZE }, (_, column) => ({ column, row }))));
    }
    for (let column = 0; column < GRID_SIZE; column++) {
      result.push(new House('column', column + 1, Array.from({ length: GRID_SIZE }, (_, row) => ({ column, row }))));
    }
    for (let box = 0; box < GRID_SIZE; box++) {
      const originRow = Math.floor(box / BOX_SIZE) * BOX_SIZE;
      const originColumn = (box % BOX_SIZE) * BOX_SIZE;
      const positions: Position[] = [];
      for (let row = originRow; row < originRow + BOX_SIZE; row++) {
        for (let column = originColumn; column < originColumn + BOX_SIZE; column++) {
          positions.push({ column, row });
        }
      }
      result.push(new House('box', box + 1, positions));
    }
    houses = result;
  }
  return houses;
}
