import yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import {
  basename,
  extname
} from 'node:path';

import { isRecord } from './typeGuards.ts';

export interface PuzzleSpec {
  readonly grid: string;
  readonly name: string;
  readonly validate: boolean;
}

export function buildPuzzleSpecs(spec: unknown, name: string): PuzzleSpec[] {
  if (!isRecord(spec)) {
    throw new Error('YAML spec must be a mapping');
  }
  const defaultValidate = readValidate(spec['validate'], 'validate') ?? true;

  const puzzlesIn = spec['puzzles'];
  if (puzzlesIn === undefined) {
    if (spec['grid'] === undefined) {
      throw new Error('YAML spec must have \'grid\' or \'puzzles\'');
    }
    return [{ grid: readGrid(spec['grid'], 'grid'), name, validate: defaultValidate }];
  }

  if (!Array.isArray(puzzlesIn) || puzzlesIn.length === 0) {
    throw new Error('puzzles must be a non-empty list');
  }

  const puzzles: PuzzleSpec[] = [];
  for (const [idx, item] of puzzlesIn.entries()) {
    const path = `puzzles[${String(idx)}]`;
    if (!isRecord(item)) {
      throw new Error(`${path} must be a mapping`);
    }
    puzzles.push({
      grid: readGrid(item['grid'], `${path}.grid`),
      name: readName(item['name'], `${path}.name`) ?? `puzzle-${String(idx + 1)}`,
      validate: readValidate(item['validate'], `${path}.validate`) ?? defaultValidate
    });
  }
  return puzzles;
}

export function loadPuzzleFile(filePath: string): PuzzleSpec[] {
  const content = readFileSync(filePath, 'utf-8');
  return buildPuzzleSpecs(yaml.load(content), basename(filePath, extname(filePath)));
}

function readGrid(value: unknown, path: string): string {
  if (typeof value === 'string') {
    return value.replace(/\s+/g, '');
  }
  if (typeof value === 'number') {
    throw new Error(`${path} must be quoted; YAML reads an unquoted digit string as a number`);
  }
  if (Array.isArray(value) && value.length > 0) {
    const rows: string[] = [];
    for (const [idx, row] of value.entries()) {
      if (typeof row === 'number') {
        throw new Error(`${path}[${String(idx)}] must be quoted; YAML reads an unquoted digit string as a number`);
      }
      if (typeof row !== 'string') {
        throw new Error(`${path}[${String(idx)}] must be a string`);
      }
      rows.push(row.replace(/\s+/g, ''));
    }
    return rows.join('');
  }
  throw new Error(`${path} must be a string or a non-empty list of row strings`);
}

function readName(value: unknown, path: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`${path} must be a non-empty string`);
  }
  return value.trim();
}

function readValidate(value: unknown, path: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  throw new Error(`${path} must be true or false`);
}
