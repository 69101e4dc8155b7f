/**
 * Mockwork Kernel — Recorded Call
 *
 * The kernel's own Invocation implementation, used by the CallDispatcher's
 * callers and by tests. Interception layers with richer call records can
 * implement Invocation directly instead.
 */

import type { CallOutcome, CallSignature, Invocation } from '../types/invocation.js';

export class RecordedCall implements Invocation {
  readonly args: ReadonlyArray<unknown>;
  private verified = false;
  private completion: CallOutcome | undefined;

  constructor(
    readonly method: CallSignature,
    args: ReadonlyArray<unknown> = [],
  ) {
    this.args = Object.freeze([...args]);
  }

  get outcome(): CallOutcome | undefined {
    return this.completion;
  }

  get isVerified(): boolean {
    return this.verified;
  }

  markAsVerified(): void {
    this.verified = true;
  }

  /**
   * Record how the call ended. A call completes once; later calls are
   * rejected.
   *
   * @throws {Error} If the call already has an outcome
   */
  complete(outcome: CallOutcome): void {
    if (this.completion !== undefined) {
      throw new Error(`Call to ${this.method} already completed`);
    }
    this.completion = outcome;
  }
}
