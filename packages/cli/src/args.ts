import { z } from 'zod';
import type { Result } from '@alphametic/core';
import { err, ok } from '@alphametic/core';

export const USAGE = [
  'Usage: alphametic <TERM1> <TERM2> <RESULT> [--max-nodes <n>] [--stats] [--json]',
  '       alphametic --samples [--max-nodes <n>] [--stats]',
].join('\n');

/** Environment variable read when `--max-nodes` is not given. */
export const MAX_NODES_ENV = 'ALPHAMETIC_MAX_NODES';

export interface CliOptions {
  /** The three words, absent in samples mode. */
  words?: [string, string, string];
  samples: boolean;
  stats: boolean;
  json: boolean;
  maxNodes: number;
}

const DEFAULT_OPTIONS: CliOptions = {
  samples: false,
  stats: false,
  json: false,
  maxNodes: Number.POSITIVE_INFINITY,
};

const MaxNodesSchema = z.coerce.number().int().positive();

function parseMaxNodes(raw: string, source: string): Result<number, string> {
  const parsed = MaxNodesSchema.safeParse(raw);
  if (!parsed.success) {
    return err(`${source} must be a positive integer, got "${raw}"`);
  }
  return ok(parsed.data);
}

/**
 * Parses command-line arguments. `--max-nodes` wins over the environment.
 */
export function parseArgs(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {}
): Result<CliOptions, string> {
  const options: CliOptions = { ...DEFAULT_OPTIONS };
  const positional: string[] = [];
  let maxNodesArg: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--samples') {
      options.samples = true;
    } else if (arg === '--stats') {
      options.stats = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--max-nodes') {
      maxNodesArg = argv[++i];
      if (maxNodesArg === undefined) return err('--max-nodes needs a value');
    } else if (arg.startsWith('--')) {
      return err(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const envMaxNodes = env[MAX_NODES_ENV];
  if (maxNodesArg !== undefined) {
    const maxNodes = parseMaxNodes(maxNodesArg, '--max-nodes');
    if (!maxNodes.ok) return maxNodes;
    options.maxNodes = maxNodes.value;
  } else if (envMaxNodes !== undefined && envMaxNodes !== '') {
    const maxNodes = parseMaxNodes(envMaxNodes, MAX_NODES_ENV);
    if (!maxNodes.ok) return maxNodes;
    options.maxNodes = maxNodes.value;
  }

  if (options.samples) {
    if (positional.length > 0) return err('--samples takes no words');
    if (options.json) return err('--json is not available with --samples');
    return ok(options);
  }

  if (positional.length !== 3) {
    return err(`Expected 3 words, got ${positional.length}`);
  }
  const [term1, term2, result] = positional;
  return ok({ ...options, words: [term1, term2, result] });
}
