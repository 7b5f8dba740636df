#!/usr/bin/env tsx
/**
 * Command-line front end for the alphametic solver.
 *
 * Exit codes: 0 solved, 1 no solution, 2 usage or invalid input,
 * 3 node budget exhausted.
 */

import { isAlphameticError, isErr } from '@alphametic/core';
import type { AlphameticErrorCode, SolveOutcome } from '@alphametic/core';
import { AlphameticSolver } from '@alphametic/puzzle';
import { USAGE, parseArgs } from './args.js';
import type { CliOptions } from './args.js';
import { isEntryPoint } from './entry.js';
import { formatReport, toJson } from './report.js';
import { SAMPLE_PUZZLES } from './samples.js';

export const EXIT_FOUND = 0;
export const EXIT_NOT_FOUND = 1;
export const EXIT_USAGE = 2;
export const EXIT_BUDGET = 3;

const EXIT_CODES: Record<AlphameticErrorCode, number> = {
  INVALID_INPUT: EXIT_USAGE,
  INVALID_CONFIG: EXIT_USAGE,
  SEARCH_BUDGET_EXCEEDED: EXIT_BUDGET,
};

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const consoleIo: CliIo = {
  out: text => console.log(text),
  err: text => console.error(text),
};

function runSamples(solver: AlphameticSolver, options: CliOptions, io: CliIo): number {
  let mismatches = 0;
  SAMPLE_PUZZLES.forEach((sample, i) => {
    const outcome = solver.solve(...sample.words);
    const separator = i === 0 ? '' : '\n';
    io.out(`${separator}${sample.solvable ? 'positive' : 'negative'} test case:`);
    io.out(formatReport(outcome, options));
    if ((outcome.status === 'found') !== sample.solvable) {
      io.err(`[alphametic] Unexpected outcome ${outcome.status} for ${sample.words.join(' ')}`);
      mismatches++;
    }
  });
  return mismatches === 0 ? EXIT_FOUND : EXIT_NOT_FOUND;
}

function report(outcome: SolveOutcome, options: CliOptions, io: CliIo): number {
  io.out(options.json ? JSON.stringify(toJson(outcome), null, 2) : formatReport(outcome, options));
  return outcome.status === 'found' ? EXIT_FOUND : EXIT_NOT_FOUND;
}

/**
 * Runs the CLI and returns its exit code.
 */
export function run(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
  io: CliIo = consoleIo
): number {
  const parsed = parseArgs(argv, env);
  if (isErr(parsed)) {
    io.err(`[alphametic] ${parsed.error}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }
  const options = parsed.value;
  const solver = new AlphameticSolver({ maxNodes: options.maxNodes });

  try {
    if (options.words === undefined) {
      return runSamples(solver, options, io);
    }
    return report(solver.solve(...options.words), options, io);
  } catch (error) {
    if (!isAlphameticError(error)) throw error;
    io.err(`[alphametic] ${error.message}`);
    return EXIT_CODES[error.code];
  }
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  process.exitCode = run(process.argv.slice(2), process.env);
}
