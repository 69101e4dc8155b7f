/**
 * Mockwork Runtime Host — LogStore Interface
 *
 * Injectable append-only storage for JSONL log files, addressed by file
 * name within one logs directory.
 *
 * Two implementations are provided:
 *   - FileLogStore: durable files under a directory
 *   - MemoryLogStore: in-memory lines for tests and embedded use
 *
 * Both yield the same raw text from readRaw() for the same appends, so the
 * log reader behaves identically on either.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface LogStore {
  /**
   * Append one line to a log file. A newline is written after it.
   * The directory is created on first write.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * The raw text of a log file, or '' if it does not exist.
   */
  readRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileLogStore
// ---------------------------------------------------------------------------

/**
 * Appends to `<logsDir>/<logfilename>` with synchronous writes, so a line is
 * on disk before the dispatch that produced it returns.
 *
 * ENOENT on read is an empty log. Every other I/O error is rethrown.
 */
export class FileLogStore implements LogStore {
  constructor(private readonly logsDir: string) {}

  appendLine(logfilename: string, line: string): void {
    mkdirSync(this.logsDir, { recursive: true });
    appendFileSync(join(this.logsDir, logfilename), line + '\n', 'utf-8');
  }

  readRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.logsDir, logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryLogStore
// ---------------------------------------------------------------------------

export class MemoryLogStore implements LogStore {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to `logfilename`, in order. Not part of LogStore. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
