/**
 * Mockwork Kernel — Dispatch Logger
 *
 * Builds dispatch and verification log entries and forwards them to an
 * optional LogSink. Without a sink (tests, embedded use) recording is a
 * no-op.
 */

import type { CallSignature } from '../types/invocation.js';
import type {
  DispatchEntry,
  DispatchLogEntry,
  MockBehavior,
  VerificationEntry,
} from '../types/log.js';
import type { LogSink } from './log-sink.js';

/** Source of ISO 8601 timestamps. Injected for deterministic tests. */
export type Clock = () => string;

export const systemClock: Clock = () => new Date().toISOString();

export class DispatchLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Whether entries go anywhere. */
  get enabled(): boolean {
    return this.sink !== undefined;
  }

  recordDispatch(fields: {
    mock: string;
    method: CallSignature;
    arity: number;
    setupId: number;
    version: number | null;
    behavior: MockBehavior;
  }): void {
    const entry: DispatchEntry = {
      event_type: 'dispatch',
      mock: fields.mock,
      method: fields.method,
      arity: fields.arity,
      outcome: fields.version === null ? 'unmatched' : 'matched',
      setup_id: fields.setupId,
      version: fields.version,
      behavior: fields.behavior,
      timestamp: this.clock(),
    };
    this.record(entry);
  }

  recordVerification(
    mock: string,
    operation: VerificationEntry['operation'],
    failures: number,
  ): void {
    this.record({
      event_type: 'verification',
      mock,
      operation,
      outcome: failures === 0 ? 'passed' : 'failed',
      failures,
      timestamp: this.clock(),
    });
  }

  private record(entry: DispatchLogEntry): void {
    this.sink?.append(entry);
  }
}
