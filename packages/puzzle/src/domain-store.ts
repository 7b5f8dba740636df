/**
 * Domain Store - Candidate digits per letter
 *
 * Domains are 10-bit masks (bit d set = digit d still possible) kept in a
 * flat array indexed by letter position in the alphabet. Every narrowing
 * pushes the previous mask onto an undo trail, so a snapshot is just the
 * trail height and restoring pops back to it.
 */

import type { Digit, Letter } from '@alphametic/core';
import { isDigit } from '@alphametic/core';

/** A set of digits as a bit mask. */
export type DigitMask = number;

export const FULL_MASK: DigitMask = 0b11_1111_1111;
export const EMPTY_MASK: DigitMask = 0;

export function maskOf(digits: Iterable<number>): DigitMask {
  let mask = EMPTY_MASK;
  for (const d of digits) {
    if (!isDigit(d)) throw new Error(`${d} is not a digit`);
    mask |= 1 << d;
  }
  return mask;
}

export function hasDigit(mask: DigitMask, digit: number): boolean {
  return (mask & (1 << digit)) !== 0;
}

/** Digits of a mask in ascending order. */
export function digitsOf(mask: DigitMask): Digit[] {
  const digits: Digit[] = [];
  for (let d = 0; d <= 9; d++) {
    if (isDigit(d) && hasDigit(mask, d)) digits.push(d);
  }
  return digits;
}

export function popcount(mask: DigitMask): number {
  let count = 0;
  for (let m = mask; m !== 0; m &= m - 1) count++;
  return count;
}

export interface NarrowResult {
  changed: boolean;
  empty: boolean;
}

/** Trail height at the moment `snapshot()` was called. */
export type DomainSnapshot = number;

interface TrailEntry {
  letter: number;
  previous: DigitMask;
}

export class DomainStore {
  private readonly masks: Uint16Array;
  private readonly trail: TrailEntry[] = [];
  private changes = 0;

  private constructor(readonly letters: readonly Letter[]) {
    this.masks = new Uint16Array(letters.length).fill(FULL_MASK);
  }

  /** Creates a store holding `{0..9}` for each letter, indexed by position. */
  static initialize(letters: readonly Letter[]): DomainStore {
    return new DomainStore([...letters]);
  }

  get letterCount(): number {
    return this.masks.length;
  }

  /**
   * Incremented on every change; the propagator compares it across a
   * pass to detect its fixpoint.
   */
  get version(): number {
    return this.changes;
  }

  mask(letter: number): DigitMask {
    this.checkLetter(letter);
    return this.masks[letter];
  }

  digits(letter: number): Digit[] {
    return digitsOf(this.mask(letter));
  }

  size(letter: number): number {
    return popcount(this.mask(letter));
  }

  isSingleton(letter: number): boolean {
    return this.size(letter) === 1;
  }

  /** The digit of a singleton domain, or null when the domain is wider or empty. */
  valueOf(letter: number): Digit | null {
    const digits = this.digits(letter);
    return digits.length === 1 ? digits[0] : null;
  }

  /**
   * Intersects the letter's domain with `allowed`.
   */
  narrow(letter: number, allowed: DigitMask): NarrowResult {
    const previous = this.mask(letter);
    const next = previous & allowed;
    if (next === previous) {
      return { changed: false, empty: next === EMPTY_MASK };
    }
    this.trail.push({ letter, previous });
    this.masks[letter] = next;
    this.changes++;
    return { changed: true, empty: next === EMPTY_MASK };
  }

  assign(letter: number, digit: Digit): NarrowResult {
    return this.narrow(letter, 1 << digit);
  }

  remove(letter: number, digit: Digit): NarrowResult {
    return this.narrow(letter, FULL_MASK & ~(1 << digit));
  }

  snapshot(): DomainSnapshot {
    return this.trail.length;
  }

  /** Reverts every narrowing made since `snapshot` was taken. */
  restore(snapshot: DomainSnapshot): void {
    if (snapshot > this.trail.length) {
      throw new Error(`Snapshot ${snapshot} is newer than the store (${this.trail.length})`);
    }
    while (this.trail.length > snapshot) {
      const entry = this.trail.pop();
      if (entry === undefined) break;
      this.masks[entry.letter] = entry.previous;
      this.changes++;
    }
  }

  /** Current domains keyed by letter, for diagnostics and tests. */
  toRecord(): Record<Letter, Digit[]> {
    const record: Record<Letter, Digit[]> = {};
    this.letters.forEach((letter, i) => {
      record[letter] = digitsOf(this.masks[i]);
    });
    return record;
  }

  private checkLetter(letter: number): void {
    if (!Number.isInteger(letter) || letter < 0 || letter >= this.masks.length) {
      throw new Error(`${letter} out of range 0..${this.masks.length}`);
    }
  }
}
