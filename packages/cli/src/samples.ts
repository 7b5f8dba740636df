export interface SamplePuzzle {
  words: [string, string, string];
  /** Whether the puzzle has a solution. */
  solvable: boolean;
}

export const SAMPLE_PUZZLES: readonly SamplePuzzle[] = [
  { words: ['CRACK', 'HACK', 'ERROR'], solvable: true },
  { words: ['SEND', 'MORE', 'MONEY'], solvable: true },
  { words: ['AGONY', 'JOY', 'GUILT'], solvable: true },
  { words: ['APPLE', 'LEMON', 'BANANA'], solvable: true },
  { words: ['APPLE', 'LEMON', 'BANANAX'], solvable: false },
  { words: ['SYSTEMA', 'ATIMA', 'SECURER'], solvable: true },
];
