/**
 * Mockwork Kernel — Dispatch Log Types
 *
 * Structured entries emitted by the CallDispatcher and the Verifier. The
 * kernel only builds entries; persisting them is the job of an injected
 * LogSink (see @mockwork/runtime-host for the JSONL implementation).
 */

import type { CallSignature } from './invocation.js';

// ---------------------------------------------------------------------------
// Mock Behavior
// ---------------------------------------------------------------------------

/**
 * How a mock treats a call that no setup governs.
 */
export enum MockBehavior {
  /** Record the call and let the interception layer return a default. */
  Loose = 'Loose',
  /** Record the call, then fail it with a MockError. */
  Strict = 'Strict',
}

// ---------------------------------------------------------------------------
// Log Entries
// ---------------------------------------------------------------------------

/** One dispatched call. */
export interface DispatchEntry {
  readonly event_type: 'dispatch';
  /** Name of the mock the call was dispatched on. */
  readonly mock: string;
  readonly method: CallSignature;
  /** Number of arguments passed. Argument values are not logged. */
  readonly arity: number;
  readonly outcome: 'matched' | 'unmatched';
  /** Id of the governing setup, or -1 when unmatched. */
  readonly setup_id: number;
  /** Match version issued for the call, or null when unmatched. */
  readonly version: number | null;
  readonly behavior: MockBehavior;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
}

/** One verification run. */
export interface VerificationEntry {
  readonly event_type: 'verification';
  readonly mock: string;
  /** Which verifier operation ran. */
  readonly operation: 'verifyAll' | 'verifyCalls' | 'verifyNoOtherCalls';
  readonly outcome: 'passed' | 'failed';
  /** Number of failures reported. 0 when passed. */
  readonly failures: number;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
}

export type DispatchLogEntry = DispatchEntry | VerificationEntry;
