import type { Assignment, Letter, PuzzleWords } from '@alphametic/core';
import type { Alphabet } from './alphabet.js';

/** Constraint kinds of a two-term sum puzzle. */
export type Constraint =
  | { kind: 'non-zero'; letter: Letter }
  | { kind: 'all-different'; letters: readonly Letter[] }
  | {
      kind: 'linear-equation';
      term1: readonly Letter[];
      term2: readonly Letter[];
      result: readonly Letter[];
    };

/**
 * Builds the constraints of `term1 + term2 = result`. Only the leading
 * letters of the two addends are forced non-zero; the result's leading
 * letter is left free.
 */
export function buildConstraints(words: PuzzleWords, alphabet: Alphabet): Constraint[] {
  const constraints: Constraint[] = [];

  const leading = new Set([words.term1[0], words.term2[0]]);
  for (const letter of leading) {
    constraints.push({ kind: 'non-zero', letter });
  }

  constraints.push({ kind: 'all-different', letters: alphabet.letters });

  constraints.push({
    kind: 'linear-equation',
    term1: [...words.term1],
    term2: [...words.term2],
    result: [...words.result],
  });

  return constraints;
}

/** Positional value of a word, most significant letter first. */
export function wordValue(letters: Iterable<Letter>, assignment: Assignment): bigint {
  let value = 0n;
  for (const letter of letters) {
    const digit = assignment.get(letter);
    if (digit === undefined) {
      throw new Error(`No digit assigned to ${letter}`);
    }
    value = value * 10n + BigInt(digit);
  }
  return value;
}

/**
 * Evaluates a constraint against a total assignment.
 */
export function isSatisfied(constraint: Constraint, assignment: Assignment): boolean {
  switch (constraint.kind) {
    case 'non-zero': {
      const digit = assignment.get(constraint.letter);
      return digit !== undefined && digit !== 0;
    }
    case 'all-different': {
      const seen = new Set<number>();
      for (const letter of constraint.letters) {
        const digit = assignment.get(letter);
        if (digit === undefined || seen.has(digit)) return false;
        seen.add(digit);
      }
      return true;
    }
    case 'linear-equation': {
      const letters = [...constraint.term1, ...constraint.term2, ...constraint.result];
      if (letters.some(letter => !assignment.has(letter))) return false;
      return (
        wordValue(constraint.term1, assignment) + wordValue(constraint.term2, assignment) ===
        wordValue(constraint.result, assignment)
      );
    }
    default:
      return ensureExhaustive(constraint);
  }
}

export function describeConstraint(constraint: Constraint): string {
  switch (constraint.kind) {
    case 'non-zero':
      return `${constraint.letter} != 0`;
    case 'all-different':
      return `all-different(${constraint.letters.join(', ')})`;
    case 'linear-equation':
      return `${constraint.term1.join('')} + ${constraint.term2.join('')} = ${constraint.result.join('')}`;
    default:
      return ensureExhaustive(constraint);
  }
}

/** `default:` branch of a switch over constraint or rule kinds; only compiles once every kind has a case. */
export function ensureExhaustive(value: never): never {
  throw new Error(`Unexpected constraint: ${JSON.stringify(value)}`);
}
