/**
 * Mockwork Runtime Host — LogReader
 *
 * Pure function for reading dispatch logs with dedupe-on-read. Accepts raw
 * JSONL text and returns typed entries plus statistics about the file.
 *
 * Guarantees:
 *   - lines that are not JSON, or not a well-formed dispatch/verification
 *     entry with a string event_id, are dropped and counted in parseErrors
 *   - entries are deduplicated by event_id; the first occurrence wins
 *   - content not ending in '\n' has its last line dropped as a partial write
 *   - more than one timestamp regression in file order sets outOfOrder
 *   - output is sorted by (timestamp asc, event_id asc), then filtered
 *   - empty input returns an empty result with zero stats
 *
 * No I/O. Callers obtain the raw content through LogStore.readRaw().
 */

import { MockBehavior } from '@mockwork/kernel';
import type { DispatchLogEntry } from '@mockwork/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A log entry as persisted by FileLogSink. */
export type StoredLogEntry = DispatchLogEntry & { readonly event_id: string };

export interface LogReadStats {
  /** Non-empty lines processed, partial trailing line excluded. */
  totalLines: number;
  /** Entries kept after deduplication, before filtering. */
  parsedEvents: number;
  duplicates: number;
  parseErrors: number;
  partialTrailingLine: boolean;
  outOfOrder: boolean;
}

export interface LogReadResult {
  /** Deduplicated, time-sorted, filtered entries. */
  events: ReadonlyArray<StoredLogEntry>;
  stats: LogReadStats;
}

export interface LogFilter {
  /** Only entries for this mock. */
  readonly mock?: string | undefined;
  readonly eventType?: StoredLogEntry['event_type'] | undefined;
  readonly outcome?: StoredLogEntry['outcome'] | undefined;
  /** Keep only the most recent `limit` entries. */
  readonly limit?: number | undefined;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Parse, deduplicate, sort and filter a dispatch log given its raw text.
 */
export function readLog(rawContent: string, filter: LogFilter = {}): LogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lineList = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const ordered: StoredLogEntry[] = [];

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const entry = toStoredEntry(parsed);
    if (entry === undefined) {
      parseErrors++;
      continue;
    }

    if (seen.has(entry.event_id)) {
      duplicates++;
    } else {
      seen.add(entry.event_id);
      ordered.push(entry);
    }
  }

  // A single regression is tolerated (clock skew); more suggests reordering.
  let regressions = 0;
  let previous: string | undefined;
  for (const entry of ordered) {
    if (previous !== undefined && entry.timestamp < previous) {
      regressions++;
    }
    previous = entry.timestamp;
  }

  const sorted = [...ordered].sort(compareEntries);

  return {
    events: applyFilter(sorted, filter),
    stats: {
      totalLines: lineList.length,
      parsedEvents: ordered.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function compareEntries(a: StoredLogEntry, b: StoredLogEntry): number {
  if (a.timestamp < b.timestamp) return -1;
  if (a.timestamp > b.timestamp) return 1;
  if (a.event_id < b.event_id) return -1;
  if (a.event_id > b.event_id) return 1;
  return 0;
}

function applyFilter(
  entries: ReadonlyArray<StoredLogEntry>,
  filter: LogFilter,
): ReadonlyArray<StoredLogEntry> {
  const kept = entries.filter(
    (e) =>
      (filter.mock === undefined || e.mock === filter.mock) &&
      (filter.eventType === undefined || e.event_type === filter.eventType) &&
      (filter.outcome === undefined || e.outcome === filter.outcome),
  );
  if (filter.limit === undefined || kept.length <= filter.limit) {
    return kept;
  }
  return filter.limit <= 0 ? [] : kept.slice(kept.length - filter.limit);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBehavior(value: unknown): value is MockBehavior {
  return value === MockBehavior.Loose || value === MockBehavior.Strict;
}

/** Rebuild a persisted entry from parsed JSON, or undefined if malformed. */
function toStoredEntry(value: unknown): StoredLogEntry | undefined {
  if (!isRecord(value)) return undefined;
  const { event_id, mock, timestamp } = value;
  if (typeof event_id !== 'string' || typeof mock !== 'string' || typeof timestamp !== 'string') {
    return undefined;
  }

  if (value['event_type'] === 'dispatch') {
    const { method, arity, outcome, setup_id, version, behavior } = value;
    if (
      typeof method !== 'string' ||
      typeof arity !== 'number' ||
      (outcome !== 'matched' && outcome !== 'unmatched') ||
      typeof setup_id !== 'number' ||
      (version !== null && typeof version !== 'number') ||
      !isBehavior(behavior)
    ) {
      return undefined;
    }
    return {
      event_id,
      event_type: 'dispatch',
      mock,
      method,
      arity,
      outcome,
      setup_id,
      version,
      behavior,
      timestamp,
    };
  }

  if (value['event_type'] === 'verification') {
    const { operation, outcome, failures } = value;
    if (
      (operation !== 'verifyAll' &&
        operation !== 'verifyCalls' &&
        operation !== 'verifyNoOtherCalls') ||
      (outcome !== 'passed' && outcome !== 'failed') ||
      typeof failures !== 'number'
    ) {
      return undefined;
    }
    return {
      event_id,
      event_type: 'verification',
      mock,
      operation,
      outcome,
      failures,
      timestamp,
    };
  }

  return undefined;
}
