import { z } from 'zod';
import type { Assignment, Digit, Letter, PuzzleWords, Result, SolveOutcome } from '@alphametic/core';
import { InvalidConfigError, InvalidInputError, PuzzleWordsSchema, err, ok, unwrap } from '@alphametic/core';
import { extractAlphabet } from './alphabet.js';
import { buildConstraints, describeConstraint } from './constraints.js';
import { DomainStore } from './domain-store.js';
import { Propagator } from './propagator.js';
import { buildFoundOutcome } from './result-builder.js';
import { SearchEngine } from './search.js';
import { verifyAssignment } from './verifier.js';

export interface SolverConfig {
  /** Node budget for the search; unlimited by default. */
  maxNodes: number;
}

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  maxNodes: Number.POSITIVE_INFINITY,
};

export const SolverConfigSchema = z.object({
  maxNodes: z
    .number()
    .positive()
    .refine(n => Number.isInteger(n) || n === Number.POSITIVE_INFINITY, {
      message: 'must be a positive integer or Infinity',
    }),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validates and uppercases the three words of a puzzle.
 */
export function parsePuzzle(
  term1: unknown,
  term2: unknown,
  result: unknown
): Result<PuzzleWords, InvalidInputError> {
  const parsed = PuzzleWordsSchema.safeParse({ term1, term2, result });
  if (!parsed.success) {
    return err(new InvalidInputError(formatIssues(parsed.error)));
  }
  return ok(parsed.data);
}

/**
 * Solves `term1 + term2 = result` over distinct decimal digits.
 *
 * The leading letters of both addends must be non-zero. Returns the first
 * solution found, or a `not-found` outcome when none exists.
 */
export class AlphameticSolver {
  private readonly config: SolverConfig;

  /** Throws `InvalidConfigError` for a `maxNodes` that is not a positive integer or Infinity. */
  constructor(config: Partial<SolverConfig> = {}) {
    const parsed = SolverConfigSchema.safeParse({ ...DEFAULT_SOLVER_CONFIG, ...config });
    if (!parsed.success) {
      throw new InvalidConfigError(formatIssues(parsed.error));
    }
    this.config = parsed.data;
  }

  solve(term1: string, term2: string, result: string): SolveOutcome {
    return this.solveWords(unwrap(parsePuzzle(term1, term2, result)));
  }

  solveWords(words: PuzzleWords): SolveOutcome {
    const alphabet = extractAlphabet(words.term1, words.term2, words.result);
    const constraints = buildConstraints(words, alphabet);
    const store = DomainStore.initialize(alphabet.letters);
    const propagator = new Propagator(alphabet, constraints);

    const outcome = new SearchEngine(store, propagator, { maxNodes: this.config.maxNodes }).run();
    if (outcome.kind === 'not-found') {
      return { status: 'not-found', words, stats: outcome.stats };
    }

    const assignment: Assignment = new Map<Letter, Digit>(
      alphabet.letters.map((letter, i) => [letter, outcome.digits[i]] as const)
    );
    const violated = verifyAssignment(constraints, assignment);
    if (violated.length > 0) {
      throw new Error(
        `Search produced an assignment violating ${violated.map(describeConstraint).join('; ')}`
      );
    }
    return buildFoundOutcome(words, assignment, outcome.stats);
  }
}

/**
 * Solves a puzzle with the default configuration merged with `config`.
 */
export function solve(
  term1: string,
  term2: string,
  result: string,
  config?: Partial<SolverConfig>
): SolveOutcome {
  return new AlphameticSolver(config).solve(term1, term2, result);
}
