import { describe, it, expect } from 'vitest';
import { SearchBudgetExceededError } from '@alphametic/core';
import { extractAlphabet } from '../alphabet.js';
import { buildConstraints } from '../constraints.js';
import { DomainStore } from '../domain-store.js';
import { Propagator } from '../propagator.js';
import { SearchEngine, type SearchConfig } from '../search.js';

function engineFor(term1: string, term2: string, result: string, config?: Partial<SearchConfig>) {
  const alphabet = extractAlphabet(term1, term2, result);
  const store = DomainStore.initialize(alphabet.letters);
  const propagator = new Propagator(alphabet, buildConstraints({ term1, term2, result }, alphabet));
  return { store, engine: new SearchEngine(store, propagator, config) };
}

describe('SearchEngine', () => {
  it('finds SEND + MORE = MONEY with digits in alphabet order', () => {
    const { engine } = engineFor('SEND', 'MORE', 'MONEY');
    const outcome = engine.run();
    expect(outcome.kind).toBe('found');
    if (outcome.kind === 'found') {
      expect(outcome.digits).toEqual([9, 5, 6, 7, 1, 0, 8, 2]);
      expect(outcome.stats).toMatchObject({
        nodes: 4,
        backtracks: 3,
        failures: 3,
        propagations: 5,
        maxDepth: 1,
      });
    }
  });

  it('tries the smallest digit of the first smallest domain first', () => {
    const { engine } = engineFor('A', 'A', 'B');
    const outcome = engine.run();
    expect(outcome.kind === 'found' && outcome.digits).toEqual([1, 2]);
    expect(outcome.stats.nodes).toBe(1);
  });

  it('finds a solution by propagation alone', () => {
    const { engine } = engineFor('TO', 'GO', 'OUT');
    const outcome = engine.run();
    expect(outcome.kind === 'found' && outcome.digits).toEqual([2, 1, 8, 0]);
    expect(outcome.stats.nodes).toBe(0);
  });

  it('reports not-found when the initial propagation fails', () => {
    const { engine } = engineFor('APPLE', 'LEMON', 'BANANAX');
    const outcome = engine.run();
    expect(outcome.kind).toBe('not-found');
    expect(outcome.stats).toMatchObject({ nodes: 0, failures: 1, propagations: 1 });
  });

  it('restores the domains of abandoned branches', () => {
    const { store, engine } = engineFor('CRACK', 'HACK', 'ERROR');
    const outcome = engine.run();
    expect(outcome.kind).toBe('found');
    expect(outcome.stats.backtracks).toBe(13);
    expect(store.toRecord()).toEqual({
      C: [4],
      R: [2],
      A: [6],
      K: [1],
      H: [9],
      E: [5],
      O: [8],
    });
  });

  it('stops when the node budget runs out', () => {
    const { engine } = engineFor('SEND', 'MORE', 'MONEY', { maxNodes: 3 });
    expect(() => engine.run()).toThrow(SearchBudgetExceededError);
  });

  it('is unaffected by a budget the search stays within', () => {
    const { engine } = engineFor('SEND', 'MORE', 'MONEY', { maxNodes: 4 });
    expect(engine.run().kind).toBe('found');
  });
});
