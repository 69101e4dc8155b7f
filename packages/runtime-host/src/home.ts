/**
 * Mockwork Runtime Host — MOCKWORK_HOME Resolution
 *
 * Resolves the Mockwork home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. MOCKWORK_HOME environment variable
 *   3. Default: ~/.mockwork
 *
 * Layout under the resolved home:
 *
 *   <MOCKWORK_HOME>/
 *     config.json
 *     logs/
 *       dispatch.jsonl
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export interface ResolveMockworkHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Environment to read MOCKWORK_HOME from. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * The Mockwork home directory the options and environment select, without
 * touching the filesystem.
 *
 * @returns Absolute path of the home directory
 */
export function mockworkHomePath(opts?: ResolveMockworkHomeOptions): string {
  const env = opts?.env ?? process.env;
  const fromEnv = env['MOCKWORK_HOME'];

  if (typeof opts?.home === 'string' && opts.home !== '') {
    return resolve(opts.home);
  }
  if (typeof fromEnv === 'string' && fromEnv !== '') {
    return resolve(fromEnv);
  }
  return join(homedir(), '.mockwork');
}

/**
 * Resolve the Mockwork home directory, creating it if it does not exist.
 *
 * @returns Absolute path of the home directory
 */
export function resolveMockworkHome(opts?: ResolveMockworkHomeOptions): string {
  const home = mockworkHomePath(opts);
  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}

/** Directory holding the dispatch log files of `home`. */
export function logsDir(home: string): string {
  return join(home, 'logs');
}
