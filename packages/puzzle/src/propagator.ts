/**
 * Propagator - Forced domain reductions without guessing
 *
 * Rules per constraint kind:
 * - non-zero: drop 0 from the letter's domain
 * - all-different: forward checking from singletons plus a pigeonhole test
 * - linear-equation: column-by-column support with a 0/1 carry chain
 *
 * Every rule only removes digits that cannot take part in any solution, so
 * the search never loses one. Rules run until no domain changes.
 */

import type { Alphabet } from './alphabet.js';
import type { Constraint } from './constraints.js';
import { ensureExhaustive } from './constraints.js';
import type { DigitMask, DomainStore } from './domain-store.js';
import { EMPTY_MASK, FULL_MASK, hasDigit, popcount } from './domain-store.js';

export type PropagationStatus = 'consistent' | 'inconsistent';

/** Marks a word with no letter in a column; it contributes the constant 0. */
const ABSENT = -1;

/**
 * One column of the sum, units first. Entries are letter indices or ABSENT.
 */
export interface Column {
  term1: number;
  term2: number;
  result: number;
}

type Rule =
  | { kind: 'non-zero'; letter: number }
  | { kind: 'all-different'; letters: readonly number[] }
  | { kind: 'linear-equation'; columns: readonly Column[] };

// Carry sets are 2-bit masks: bit 0 = carry 0, bit 1 = carry 1.
const CARRY_0 = 0b01;
const CARRIES = [0, 1] as const;

function carryBit(carry: number): number {
  return 1 << carry;
}

/**
 * Splits three words into columns, units column first.
 */
export function toColumns(
  term1: readonly number[],
  term2: readonly number[],
  result: readonly number[]
): Column[] {
  const width = Math.max(term1.length, term2.length, result.length);
  const at = (word: readonly number[], i: number): number =>
    i < word.length ? word[word.length - 1 - i] : ABSENT;

  const columns: Column[] = [];
  for (let i = 0; i < width; i++) {
    columns.push({ term1: at(term1, i), term2: at(term2, i), result: at(result, i) });
  }
  return columns;
}

export class Propagator {
  private readonly rules: readonly Rule[];

  constructor(alphabet: Alphabet, constraints: readonly Constraint[]) {
    this.rules = constraints.map(constraint => compile(alphabet, constraint));
  }

  /**
   * Applies every rule until a fixpoint, or stops at the first empty domain.
   */
  propagate(store: DomainStore): PropagationStatus {
    for (;;) {
      const before = store.version;
      for (const rule of this.rules) {
        if (!this.apply(rule, store)) return 'inconsistent';
      }
      if (store.version === before) return 'consistent';
    }
  }

  private apply(rule: Rule, store: DomainStore): boolean {
    switch (rule.kind) {
      case 'non-zero':
        return !store.remove(rule.letter, 0).empty;
      case 'all-different':
        return propagateAllDifferent(store, rule.letters);
      case 'linear-equation':
        return propagateEquation(store, rule.columns);
      default:
        return ensureExhaustive(rule);
    }
  }
}

function compile(alphabet: Alphabet, constraint: Constraint): Rule {
  switch (constraint.kind) {
    case 'non-zero':
      return { kind: 'non-zero', letter: alphabet.indexOf(constraint.letter) };
    case 'all-different':
      return {
        kind: 'all-different',
        letters: constraint.letters.map(letter => alphabet.indexOf(letter)),
      };
    case 'linear-equation':
      return {
        kind: 'linear-equation',
        columns: toColumns(
          constraint.term1.map(letter => alphabet.indexOf(letter)),
          constraint.term2.map(letter => alphabet.indexOf(letter)),
          constraint.result.map(letter => alphabet.indexOf(letter))
        ),
      };
    default:
      return ensureExhaustive(constraint);
  }
}

// =============================================================================
// all-different
// =============================================================================

function propagateAllDifferent(store: DomainStore, letters: readonly number[]): boolean {
  const propagated = new Set<number>();
  let progress = true;
  while (progress) {
    progress = false;
    for (const letter of letters) {
      if (propagated.has(letter)) continue;
      const digit = store.valueOf(letter);
      if (digit === null) continue;
      propagated.add(letter);
      progress = true;
      for (const other of letters) {
        if (other !== letter && store.remove(other, digit).empty) return false;
      }
    }
  }

  // Pigeonhole: n letters need n distinct candidate digits between them.
  let union = EMPTY_MASK;
  for (const letter of letters) union |= store.mask(letter);
  return popcount(union) >= letters.length;
}

// =============================================================================
// linear-equation
// =============================================================================

type TupleVisitor = (a: number, b: number, r: number, carryOut: number) => void;

/**
 * Enumerates the digit tuples of one column that fit the current domains
 * for a given carry-in. A letter repeated within the column takes a single
 * digit; different letters take different digits.
 */
function forEachTuple(store: DomainStore, column: Column, carryIn: number, visit: TupleVisitor): void {
  const { term1, term2, result } = column;
  const firstDigits = term1 === ABSENT ? [0] : store.digits(term1);

  for (const a of firstDigits) {
    const secondDigits = term2 === ABSENT ? [0] : term2 === term1 ? [a] : store.digits(term2);
    for (const b of secondDigits) {
      if (term1 !== ABSENT && term2 !== ABSENT && term2 !== term1 && a === b) continue;

      const sum = a + b + carryIn;
      const r = sum % 10;
      const carryOut = sum >= 10 ? 1 : 0;

      if (result === ABSENT) {
        if (r !== 0) continue;
      } else {
        if (!hasDigit(store.mask(result), r)) continue;
        if (!agrees(result, r, term1, a) || !agrees(result, r, term2, b)) continue;
      }
      visit(a, b, r, carryOut);
    }
  }
}

/** Same letter means same digit, different letters mean different digits. */
function agrees(letter: number, digit: number, other: number, otherDigit: number): boolean {
  if (other === ABSENT) return true;
  return letter === other ? digit === otherDigit : digit !== otherDigit;
}

function propagateEquation(store: DomainStore, columns: readonly Column[]): boolean {
  const width = columns.length;

  // Carries that can reach column i from the units column.
  const forward = new Array<number>(width + 1).fill(0);
  forward[0] = CARRY_0;
  for (let i = 0; i < width; i++) {
    for (const carryIn of CARRIES) {
      if ((forward[i] & carryBit(carryIn)) === 0) continue;
      forEachTuple(store, columns[i], carryIn, (_a, _b, _r, carryOut) => {
        forward[i + 1] |= carryBit(carryOut);
      });
    }
  }
  if ((forward[width] & CARRY_0) === 0) return false;

  // Carries into column i from which the final carry 0 is still reachable.
  const backward = new Array<number>(width + 1).fill(0);
  backward[width] = CARRY_0;
  for (let i = width - 1; i >= 0; i--) {
    for (const carryIn of CARRIES) {
      if ((forward[i] & carryBit(carryIn)) === 0) continue;
      forEachTuple(store, columns[i], carryIn, (_a, _b, _r, carryOut) => {
        if ((backward[i + 1] & carryBit(carryOut)) !== 0) {
          backward[i] |= carryBit(carryIn);
        }
      });
    }
  }
  if ((backward[0] & CARRY_0) === 0) return false;

  // A letter keeps a digit only if every column it occurs in supports it.
  const allowed = new Array<DigitMask>(store.letterCount).fill(FULL_MASK);
  for (let i = 0; i < width; i++) {
    const column = columns[i];
    const support = new Map<number, DigitMask>();
    const mark = (letter: number, digit: number): void => {
      if (letter !== ABSENT) support.set(letter, (support.get(letter) ?? EMPTY_MASK) | (1 << digit));
    };

    for (const carryIn of CARRIES) {
      if ((backward[i] & carryBit(carryIn)) === 0) continue;
      forEachTuple(store, column, carryIn, (a, b, r, carryOut) => {
        if ((backward[i + 1] & carryBit(carryOut)) === 0) return;
        mark(column.term1, a);
        mark(column.term2, b);
        mark(column.result, r);
      });
    }

    for (const letter of [column.term1, column.term2, column.result]) {
      if (letter !== ABSENT) allowed[letter] &= support.get(letter) ?? EMPTY_MASK;
    }
  }

  for (let letter = 0; letter < allowed.length; letter++) {
    if (store.narrow(letter, allowed[letter]).empty) return false;
  }
  return true;
}
