/**
 * Error taxonomy. Only conditions the caller can act on are errors; a
 * puzzle without a solution is a `not-found` outcome, not an exception.
 */

export type AlphameticErrorCode = 'INVALID_INPUT' | 'INVALID_CONFIG' | 'SEARCH_BUDGET_EXCEEDED';

export abstract class AlphameticError extends Error {
  abstract readonly code: AlphameticErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed puzzle words. Raised before any search starts.
 */
export class InvalidInputError extends AlphameticError {
  readonly code = 'INVALID_INPUT';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid puzzle input: ${issues.join('; ')}`);
  }
}

/** Solver options that fail validation, such as a `maxNodes` of NaN. */
export class InvalidConfigError extends AlphameticError {
  readonly code = 'INVALID_CONFIG';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid solver config: ${issues.join('; ')}`);
  }
}

/**
 * The search tried more nodes than its configured budget allowed.
 */
export class SearchBudgetExceededError extends AlphameticError {
  readonly code = 'SEARCH_BUDGET_EXCEEDED';

  constructor(readonly maxNodes: number) {
    super(`Search exceeded its budget of ${maxNodes} nodes`);
  }
}

export function isAlphameticError(e: unknown): e is AlphameticError {
  return e instanceof AlphameticError;
}
