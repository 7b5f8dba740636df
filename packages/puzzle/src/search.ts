/**
 * Search Engine - Depth-first backtracking over digit choices
 *
 * Picks the open letter with the fewest candidates (ties go to alphabet
 * order), tries its digits in ascending order and propagates after each
 * choice. Stops at the first assignment where every domain is a single
 * digit.
 */

import type { Digit, SearchStats } from '@alphametic/core';
import { SearchBudgetExceededError } from '@alphametic/core';
import type { DomainStore } from './domain-store.js';
import type { Propagator } from './propagator.js';

export interface SearchConfig {
  /** Tentative assignments allowed before giving up. */
  maxNodes: number;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxNodes: Number.POSITIVE_INFINITY,
};

/** Digit per letter index. */
export type SearchOutcome =
  | { kind: 'found'; digits: readonly Digit[]; stats: SearchStats }
  | { kind: 'not-found'; stats: SearchStats };

export class SearchEngine {
  private readonly config: SearchConfig;
  private stats: SearchStats = emptyStats();

  constructor(
    private readonly store: DomainStore,
    private readonly propagator: Propagator,
    config?: Partial<SearchConfig>
  ) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
  }

  run(): SearchOutcome {
    const startTime = Date.now();
    this.stats = emptyStats();

    const found = this.propagate() && this.descend(0);
    this.stats.elapsedMs = Date.now() - startTime;

    if (!found) {
      return { kind: 'not-found', stats: { ...this.stats } };
    }
    return { kind: 'found', digits: this.readDigits(), stats: { ...this.stats } };
  }

  private descend(depth: number): boolean {
    this.stats.maxDepth = Math.max(this.stats.maxDepth, depth);

    const letter = this.selectLetter();
    if (letter === null) return true;

    for (const digit of this.store.digits(letter)) {
      if (this.stats.nodes >= this.config.maxNodes) {
        throw new SearchBudgetExceededError(this.config.maxNodes);
      }
      this.stats.nodes++;

      const snapshot = this.store.snapshot();
      if (!this.store.assign(letter, digit).empty && this.propagate() && this.descend(depth + 1)) {
        return true;
      }
      this.store.restore(snapshot);
      this.stats.backtracks++;
    }
    return false;
  }

  /**
   * Minimum remaining values: the smallest domain wider than one digit, or
   * null when every letter is decided.
   */
  private selectLetter(): number | null {
    let best: number | null = null;
    let bestSize = Number.POSITIVE_INFINITY;
    for (let letter = 0; letter < this.store.letterCount; letter++) {
      const size = this.store.size(letter);
      if (size > 1 && size < bestSize) {
        best = letter;
        bestSize = size;
      }
    }
    return best;
  }

  private propagate(): boolean {
    this.stats.propagations++;
    if (this.propagator.propagate(this.store) === 'consistent') return true;
    this.stats.failures++;
    return false;
  }

  private readDigits(): Digit[] {
    const digits: Digit[] = [];
    for (let letter = 0; letter < this.store.letterCount; letter++) {
      const digit = this.store.valueOf(letter);
      if (digit === null) {
        throw new Error(`Letter ${this.store.letters[letter]} is undecided after search`);
      }
      digits.push(digit);
    }
    return digits;
  }
}

function emptyStats(): SearchStats {
  return {
    nodes: 0,
    backtracks: 0,
    failures: 0,
    propagations: 0,
    maxDepth: 0,
    elapsedMs: 0,
  };
}
