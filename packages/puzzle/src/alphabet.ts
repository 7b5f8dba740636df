import type { Letter } from '@alphametic/core';
import { InvalidInputError } from '@alphametic/core';

/**
 * The distinct letters of a puzzle in first-occurrence order across
 * `term1 + term2 + result`. A letter's position is its variable index
 * everywhere in the engine, and the search breaks ties in this order.
 */
export class Alphabet {
  private readonly positions: ReadonlyMap<Letter, number>;

  constructor(readonly letters: readonly Letter[]) {
    this.positions = new Map(letters.map((letter, i) => [letter, i] as const));
  }

  get size(): number {
    return this.letters.length;
  }

  has(letter: Letter): boolean {
    return this.positions.has(letter);
  }

  indexOf(letter: Letter): number {
    const index = this.positions.get(letter);
    if (index === undefined) {
      throw new Error(`Letter ${letter} is not part of the alphabet ${this.letters.join('')}`);
    }
    return index;
  }

  /** Letter indices of a word, most significant first. */
  indicesOf(word: string): number[] {
    return [...word].map(letter => this.indexOf(letter));
  }
}

export function extractAlphabet(term1: string, term2: string, result: string): Alphabet {
  const issues = (
    [
      ['term1', term1],
      ['term2', term2],
      ['result', result],
    ] as const
  )
    .filter(([, word]) => word.length === 0)
    .map(([name]) => `${name}: must not be empty`);
  if (issues.length > 0) {
    throw new InvalidInputError(issues);
  }

  const letters: Letter[] = [];
  for (const letter of term1 + term2 + result) {
    if (!letters.includes(letter)) letters.push(letter);
  }
  return new Alphabet(letters);
}
