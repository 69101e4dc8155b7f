/**
 * Mockwork Runtime Host — File-backed Dispatch Log Sink
 *
 * Implements the LogSink interface from @mockwork/kernel by appending one
 * JSONL line per entry to `dispatch.jsonl` (or the configured log file)
 * through an injected LogStore.
 *
 * The kernel owns the LogSink interface and the DispatchLogger; this class
 * is the only place that writes dispatch log entries to disk. Each line is
 * the kernel entry with a ULID `event_id` prepended, so readers can
 * deduplicate logs merged from several sources.
 *
 * The sink is synchronous: the line is written before the call returns.
 */

import type { DispatchLogEntry, LogSink } from '@mockwork/kernel';
import type { LogStore } from '../state/log-store.js';
import { ulid } from './ulid.js';
import type { UlidFactory } from './ulid.js';

export const DEFAULT_LOG_FILE = 'dispatch.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly store: LogStore,
    private readonly logfilename: string = DEFAULT_LOG_FILE,
    private readonly nextEventId: UlidFactory = ulid,
  ) {}

  append(entry: DispatchLogEntry): void {
    const line = JSON.stringify({ event_id: this.nextEventId(), ...entry });
    this.store.appendLine(this.logfilename, line);
  }
}
