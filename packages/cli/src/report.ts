import type { SearchStats, SolveOutcome } from '@alphametic/core';

export interface ReportOptions {
  stats: boolean;
}

function formatStats(stats: SearchStats): string {
  return [
    `nodes=${stats.nodes}`,
    `backtracks=${stats.backtracks}`,
    `failures=${stats.failures}`,
    `propagations=${stats.propagations}`,
    `depth=${stats.maxDepth}`,
    `time=${stats.elapsedMs}ms`,
  ].join(' ');
}

/**
 * Human-readable report: the task, whether a solution exists and, when it
 * does, the equation with digits substituted.
 */
export function formatReport(outcome: SolveOutcome, options: ReportOptions = { stats: false }): string {
  const { term1, term2, result } = outcome.words;
  const lines = [
    `\tTASK     : ${term1} + ${term2} = ${result}`,
    `\tSOLUTION : ${outcome.status === 'found'}`,
  ];
  if (outcome.status === 'found') {
    // Leading zeros of the result stay visible, digit for letter.
    const { assignment } = outcome;
    const digits = (word: string) => [...word].map(letter => assignment.get(letter)).join('');
    lines.push(`\tRESULT   : ${digits(term1)} + ${digits(term2)} = ${digits(result)}`);
  }
  if (options.stats) {
    lines.push(`\tSTATS    : ${formatStats(outcome.stats)}`);
  }
  return lines.join('\n');
}

export interface OutcomeJson {
  status: SolveOutcome['status'];
  words: SolveOutcome['words'];
  values?: { term1: string; term2: string; result: string };
  assignment?: Record<string, number>;
  stats: SearchStats;
}

/** JSON-safe view of an outcome; values are decimal strings. */
export function toJson(outcome: SolveOutcome): OutcomeJson {
  if (outcome.status === 'not-found') {
    return { status: outcome.status, words: outcome.words, stats: outcome.stats };
  }
  return {
    status: outcome.status,
    words: outcome.words,
    values: {
      term1: outcome.term1Value.toString(),
      term2: outcome.term2Value.toString(),
      result: outcome.resultValue.toString(),
    },
    assignment: Object.fromEntries(outcome.assignment),
    stats: outcome.stats,
  };
}
