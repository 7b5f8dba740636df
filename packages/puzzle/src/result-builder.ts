import type { Assignment, FoundOutcome, PuzzleWords, SearchStats } from '@alphametic/core';
import { wordValue } from './constraints.js';

/**
 * Projects a total assignment back onto the three words.
 */
export function buildFoundOutcome(
  words: PuzzleWords,
  assignment: Assignment,
  stats: SearchStats
): FoundOutcome {
  return {
    status: 'found',
    words,
    term1Value: wordValue(words.term1, assignment),
    term2Value: wordValue(words.term2, assignment),
    resultValue: wordValue(words.result, assignment),
    assignment,
    stats,
  };
}
