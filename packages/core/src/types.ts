/**
 * Core types for the alphametic solver
 */

import { z } from 'zod';

// =============================================================================
// Input
// =============================================================================

/** A word of a puzzle: letters only, any case. */
export const WordSchema = z
  .string()
  .min(1, { message: 'must not be empty' })
  .regex(/^[A-Za-z]*$/, { message: 'must contain only the letters A-Z' })
  .transform(word => word.toUpperCase());

export const PuzzleWordsSchema = z.object({
  term1: WordSchema,
  term2: WordSchema,
  result: WordSchema,
});

/** The three uppercased words of `term1 + term2 = result`. */
export type PuzzleWords = z.output<typeof PuzzleWordsSchema>;

// =============================================================================
// Letters and digits
// =============================================================================

/** A single uppercase character acting as a variable. */
export type Letter = string;

export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const DIGITS: readonly Digit[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

export function isDigit(n: number): n is Digit {
  return Number.isInteger(n) && n >= 0 && n <= 9;
}

/** A letter-to-digit mapping. Total and injective once a puzzle is solved. */
export type Assignment = ReadonlyMap<Letter, Digit>;

// =============================================================================
// Outcome
// =============================================================================

export interface SearchStats {
  /** Tentative assignments tried by the search. */
  nodes: number;
  /** Assignments undone after their subtree failed. */
  backtracks: number;
  /** Propagation runs that emptied a domain. */
  failures: number;
  /** Propagation runs, including the initial one. */
  propagations: number;
  maxDepth: number;
  elapsedMs: number;
}

export interface FoundOutcome {
  status: 'found';
  words: PuzzleWords;
  term1Value: bigint;
  term2Value: bigint;
  resultValue: bigint;
  assignment: Assignment;
  stats: SearchStats;
}

export interface NotFoundOutcome {
  status: 'not-found';
  words: PuzzleWords;
  stats: SearchStats;
}

export type SolveOutcome = FoundOutcome | NotFoundOutcome;

export function isFound(outcome: SolveOutcome): outcome is FoundOutcome {
  return outcome.status === 'found';
}
