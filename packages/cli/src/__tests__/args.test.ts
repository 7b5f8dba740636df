import { describe, it, expect } from 'vitest';
import { MAX_NODES_ENV, parseArgs } from '../args.js';

describe('parseArgs', () => {
  it('reads three words with default options', () => {
    const parsed = parseArgs(['SEND', 'MORE', 'MONEY']);
    expect(parsed).toEqual({
      ok: true,
      value: {
        words: ['SEND', 'MORE', 'MONEY'],
        samples: false,
        stats: false,
        json: false,
        maxNodes: Number.POSITIVE_INFINITY,
      },
    });
  });

  it('accepts flags around the words', () => {
    const parsed = parseArgs(['--stats', 'A', '--json', 'B', 'C', '--max-nodes', '50']);
    expect(parsed.ok && parsed.value).toEqual({
      words: ['A', 'B', 'C'],
      samples: false,
      stats: true,
      json: true,
      maxNodes: 50,
    });
  });

  it('reads the node budget from the environment', () => {
    const parsed = parseArgs(['A', 'B', 'C'], { [MAX_NODES_ENV]: '12' });
    expect(parsed.ok && parsed.value.maxNodes).toBe(12);
  });

  it('prefers --max-nodes over the environment', () => {
    const parsed = parseArgs(['A', 'B', 'C', '--max-nodes', '7'], { [MAX_NODES_ENV]: '12' });
    expect(parsed.ok && parsed.value.maxNodes).toBe(7);
  });

  it('ignores an empty environment value', () => {
    const parsed = parseArgs(['A', 'B', 'C'], { [MAX_NODES_ENV]: '' });
    expect(parsed.ok && parsed.value.maxNodes).toBe(Number.POSITIVE_INFINITY);
  });

  it('rejects a budget that is not a positive integer', () => {
    expect(parseArgs(['A', 'B', 'C', '--max-nodes', '0'])).toEqual({
      ok: false,
      error: '--max-nodes must be a positive integer, got "0"',
    });
    expect(parseArgs(['A', 'B', 'C'], { [MAX_NODES_ENV]: 'lots' })).toEqual({
      ok: false,
      error: 'ALPHAMETIC_MAX_NODES must be a positive integer, got "lots"',
    });
  });

  it('rejects --max-nodes without a value', () => {
    expect(parseArgs(['A', 'B', 'C', '--max-nodes'])).toEqual({
      ok: false,
      error: '--max-nodes needs a value',
    });
  });

  it('rejects unknown options', () => {
    expect(parseArgs(['A', 'B', 'C', '--verbose'])).toEqual({
      ok: false,
      error: 'Unknown option --verbose',
    });
  });

  it('requires exactly three words', () => {
    expect(parseArgs(['A', 'B'])).toEqual({ ok: false, error: 'Expected 3 words, got 2' });
    expect(parseArgs([])).toEqual({ ok: false, error: 'Expected 3 words, got 0' });
  });

  describe('samples mode', () => {
    it('takes no words', () => {
      const parsed = parseArgs(['--samples', '--stats']);
      expect(parsed.ok && parsed.value).toEqual({
        samples: true,
        stats: true,
        json: false,
        maxNodes: Number.POSITIVE_INFINITY,
      });
      expect(parseArgs(['--samples', 'A'])).toEqual({ ok: false, error: '--samples takes no words' });
    });

    it('does not combine with --json', () => {
      expect(parseArgs(['--samples', '--json'])).toEqual({
        ok: false,
        error: '--json is not available with --samples',
      });
    });
  });
});
