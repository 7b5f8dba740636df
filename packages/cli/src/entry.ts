import { existsSync, realpathSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

function realPath(file: string): string {
  return existsSync(file) ? realpathSync(file) : path.resolve(file);
}

/**
 * Whether the module at `moduleUrl` is the script node was started with.
 * `argv1` may be a symlink, as it is when npm links a package bin into
 * `node_modules/.bin`.
 */
export function isEntryPoint(moduleUrl: string, argv1: string | undefined): boolean {
  if (argv1 === undefined || !moduleUrl.startsWith('file:')) return false;
  return realPath(fileURLToPath(moduleUrl)) === realPath(argv1);
}
