import { describe, it, expect } from 'vitest';
import type { SearchStats, SolveOutcome } from '@alphametic/core';
import { solve } from '@alphametic/puzzle';
import { formatReport, toJson } from '../report.js';

const stats: SearchStats = {
  nodes: 4,
  backtracks: 3,
  failures: 3,
  propagations: 5,
  maxDepth: 1,
  elapsedMs: 2,
};

const notFound: SolveOutcome = {
  status: 'not-found',
  words: { term1: 'APPLE', term2: 'LEMON', result: 'BANANAX' },
  stats,
};

describe('formatReport', () => {
  it('prints the task, the verdict and the substituted equation', () => {
    expect(formatReport(solve('send', 'more', 'money')).split('\n')).toEqual([
      '\tTASK     : SEND + MORE = MONEY',
      '\tSOLUTION : true',
      '\tRESULT   : 9567 + 1085 = 10652',
    ]);
  });

  it('keeps a leading zero in the result', () => {
    const lines = formatReport(solve('AB', 'CD', 'EFG')).split('\n');
    expect(lines[2]).toBe('\tRESULT   : 14 + 25 = 039');
  });

  it('prints no result line without a solution', () => {
    expect(formatReport(notFound)).toBe('\tTASK     : APPLE + LEMON = BANANAX\n\tSOLUTION : false');
  });

  it('appends search statistics on request', () => {
    expect(formatReport(notFound, { stats: true }).split('\n')[2]).toBe(
      '\tSTATS    : nodes=4 backtracks=3 failures=3 propagations=5 depth=1 time=2ms'
    );
  });
});

describe('toJson', () => {
  it('renders values as decimal strings and the assignment as an object', () => {
    const json = toJson(solve('SEND', 'MORE', 'MONEY'));
    expect(json.status).toBe('found');
    expect(json.values).toEqual({ term1: '9567', term2: '1085', result: '10652' });
    expect(json.assignment).toEqual({ S: 9, E: 5, N: 6, D: 7, M: 1, O: 0, R: 8, Y: 2 });
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });

  it('leaves out values and assignment without a solution', () => {
    expect(toJson(notFound)).toEqual({
      status: 'not-found',
      words: { term1: 'APPLE', term2: 'LEMON', result: 'BANANAX' },
      stats,
    });
  });
});
