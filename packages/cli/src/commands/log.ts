/**
 * mockwork log — Query the dispatch log
 *
 * Reads the dispatch log under the Mockwork home, deduplicated and sorted
 * by time, and prints the entries matching the given filters. Problems
 * found while reading (malformed lines, a partial trailing write, entries
 * out of order) are reported on stderr without failing the command.
 */

import { Command } from 'commander';
import {
  FileLogStore,
  loadConfig,
  logsDir,
  mockworkHomePath,
  readLog,
} from '@mockwork/runtime-host';
import type { LogFilter, StoredLogEntry } from '@mockwork/runtime-host';
import { emit, formatValidationErrors } from './replay.js';
import type { CommandResult } from './replay.js';

const EVENT_TYPES: ReadonlyArray<StoredLogEntry['event_type']> = ['dispatch', 'verification'];
const OUTCOMES: ReadonlyArray<StoredLogEntry['outcome']> = [
  'matched',
  'unmatched',
  'passed',
  'failed',
];

export const DEFAULT_LIMIT = 100;

export interface LogQueryOptions {
  readonly home?: string | undefined;
  readonly mock?: string | undefined;
  readonly type?: string | undefined;
  readonly outcome?: string | undefined;
  readonly limit?: string | undefined;
  readonly json?: boolean | undefined;
}

function isEventType(value: string): value is StoredLogEntry['event_type'] {
  return EVENT_TYPES.some((t) => t === value);
}

function isOutcome(value: string): value is StoredLogEntry['outcome'] {
  return OUTCOMES.some((o) => o === value);
}

export function formatEntry(entry: StoredLogEntry): string {
  const head = `${entry.timestamp}  ${entry.event_id}  ${entry.event_type}  ${entry.mock}`;
  if (entry.event_type === 'dispatch') {
    const governed = entry.outcome === 'matched' ? `  setup=#${entry.setup_id} v${entry.version ?? '?'}` : '';
    return `${head}  ${entry.method}  ${entry.outcome}${governed}`;
  }
  return `${head}  ${entry.operation}  ${entry.outcome}  failures=${entry.failures}`;
}

export function runLogQuery(options: LogQueryOptions): CommandResult {
  const errors: string[] = [];
  const { type, outcome } = options;
  if (type !== undefined && !isEventType(type)) {
    errors.push(`--type must be one of ${EVENT_TYPES.join(', ')}, got "${type}"`);
  }
  if (outcome !== undefined && !isOutcome(outcome)) {
    errors.push(`--outcome must be one of ${OUTCOMES.join(', ')}, got "${outcome}"`);
  }
  const limit = options.limit === undefined ? DEFAULT_LIMIT : Number(options.limit);
  if (!Number.isInteger(limit) || limit < 0) {
    errors.push(`--limit must be a non-negative integer, got "${options.limit ?? ''}"`);
  }
  if (errors.length > 0) {
    return { exitCode: 1, lines: [], errors };
  }

  const home = mockworkHomePath({ home: options.home });
  const config = loadConfig(home);
  if (!config.ok) {
    return {
      exitCode: 1,
      lines: [],
      errors: formatValidationErrors('Invalid configuration:', config.errors),
    };
  }

  const filter: LogFilter = {
    mock: options.mock,
    eventType: type !== undefined && isEventType(type) ? type : undefined,
    outcome: outcome !== undefined && isOutcome(outcome) ? outcome : undefined,
    limit,
  };
  const raw = new FileLogStore(logsDir(home)).readRaw(config.value.logFile);
  const { events, stats } = readLog(raw, filter);

  const warnings: string[] = [];
  if (stats.parseErrors > 0) {
    warnings.push(`warning: skipped ${stats.parseErrors} malformed line(s)`);
  }
  if (stats.partialTrailingLine) {
    warnings.push('warning: ignored a partial trailing line');
  }
  if (stats.outOfOrder) {
    warnings.push('warning: log entries were written out of order');
  }

  if (options.json === true) {
    return { exitCode: 0, lines: [JSON.stringify({ events, stats }, null, 2)], errors: warnings };
  }
  return {
    exitCode: 0,
    lines: events.length === 0 ? ['(no entries)'] : events.map(formatEntry),
    errors: warnings,
  };
}

export const logCommand = new Command('log')
  .description('Query the dispatch log')
  .option('--home <dir>', 'Mockwork home directory (default: $MOCKWORK_HOME or ~/.mockwork)')
  .option('--mock <name>', 'Filter by mock name')
  .option('--type <type>', 'Filter by event type (dispatch|verification)')
  .option('--outcome <outcome>', 'Filter by outcome (matched|unmatched|passed|failed)')
  .option('--limit <n>', 'Maximum number of most recent entries to return', String(DEFAULT_LIMIT))
  .option('--json', 'Output as JSON')
  .action((options: LogQueryOptions) => {
    emit(runLogQuery(options), options.json === true);
  });
