/**
 * mockwork replay — Replay a scenario file
 *
 * Validates a JSON scenario, replays it through the kernel dispatcher and
 * verifier, and prints a step-by-step report. Dispatch and verification
 * events are appended to the home dispatch log unless --no-log is given.
 *
 * Exit code 1 when the scenario is invalid or a verification step fails.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import type { ValidationError } from '@mockwork/kernel';
import {
  FileLogSink,
  FileLogStore,
  loadConfig,
  logsDir,
  resolveMockworkHome,
} from '@mockwork/runtime-host';
import { paintLine, t } from '../output/theme.js';
import { formatReport } from '../scenario/report.js';
import { runScenario } from '../scenario/runner.js';
import { validateScenario } from '../scenario/validator.js';

export interface ReplayOptions {
  readonly file: string;
  readonly home?: string | undefined;
  readonly json?: boolean | undefined;
  /** Append events to the dispatch log. Defaults to true. */
  readonly log?: boolean | undefined;
}

export interface CommandResult {
  readonly exitCode: 0 | 1;
  /** Lines for stdout. */
  readonly lines: ReadonlyArray<string>;
  /** Lines for stderr. */
  readonly errors: ReadonlyArray<string>;
}

export function formatValidationErrors(
  title: string,
  errors: ReadonlyArray<ValidationError>,
): string[] {
  return [
    title,
    ...errors.map((e) => (e.context !== undefined ? `  ${e.context}: ${e.message}` : `  ${e.message}`)),
  ];
}

function failed(errors: string[]): CommandResult {
  return { exitCode: 1, lines: [], errors };
}

export function runReplay(options: ReplayOptions): CommandResult {
  const home = resolveMockworkHome({ home: options.home });
  const config = loadConfig(home);
  if (!config.ok) {
    return failed(formatValidationErrors('Invalid configuration:', config.errors));
  }

  const path = resolve(options.file);
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    return failed([`Cannot read scenario ${path}: ${detail}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    return failed([`Scenario ${path} is not valid JSON: ${detail}`]);
  }

  const scenario = validateScenario(parsed);
  if (!scenario.ok) {
    return failed(formatValidationErrors(`Invalid scenario ${path}:`, scenario.errors));
  }

  const logSink =
    options.log === false
      ? undefined
      : new FileLogSink(new FileLogStore(logsDir(home)), config.value.logFile);
  const report = runScenario(scenario.value, {
    logSink,
    defaultBehavior: config.value.defaultBehavior,
  });

  return {
    exitCode: report.passed ? 0 : 1,
    lines: options.json === true ? [JSON.stringify(report, null, 2)] : formatReport(report),
    errors: [],
  };
}

/**
 * Print a command result and set the process exit code. Lines are
 * coloured unless `plain` (machine output).
 */
export function emit(result: CommandResult, plain = false): void {
  for (const line of result.lines) {
    // eslint-disable-next-line no-console
    console.log(plain ? line : paintLine(line));
  }
  for (const line of result.errors) {
    const painted = line.startsWith('warning: ') ? paintLine(line) : t.red(line);
    // eslint-disable-next-line no-console
    console.error(plain ? line : painted);
  }
  process.exitCode = result.exitCode;
}

export const replayCommand = new Command('replay')
  .description('Replay a scenario file through the dispatcher and verifier')
  .argument('<scenario>', 'Path to a scenario JSON file')
  .option('--home <dir>', 'Mockwork home directory (default: $MOCKWORK_HOME or ~/.mockwork)')
  .option('--json', 'Output the report as JSON')
  .option('--no-log', 'Do not append events to the dispatch log')
  .action((file: string, options: { home?: string; json?: boolean; log: boolean }) => {
    emit(
      runReplay({ file, home: options.home, json: options.json, log: options.log }),
      options.json === true,
    );
  });
