import type { Conflict } from './validation.ts';

export class ConflictingFixedDigitsError extends Error {
  public override name = 'ConflictingFixedDigitsError';

  public constructor(message: string, public readonly conflicts: readonly Conflict[]) {
    super(message);
  }
}

export class InvalidInputFormatError extends Error {
  public override name = 'InvalidInputFormatError';

  public constructor(message: string, public readonly input: string) {
    super(message);
  }
}
