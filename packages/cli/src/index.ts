export { run, EXIT_FOUND, EXIT_NOT_FOUND, EXIT_USAGE, EXIT_BUDGET, type CliIo } from './main.js';
export { isEntryPoint } from './entry.js';
export { parseArgs, USAGE, MAX_NODES_ENV, type CliOptions } from './args.js';
export { formatReport, toJson, type ReportOptions, type OutcomeJson } from './report.js';
export { SAMPLE_PUZZLES, type SamplePuzzle } from './samples.js';
