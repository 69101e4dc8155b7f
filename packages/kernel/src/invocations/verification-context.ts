/**
 * Mockwork Kernel — Verification Context
 *
 * Point-in-time view of an InvocationLog's matched-invocation index, opened
 * by InvocationLog.asInvocationContext() for one verification pass.
 *
 * The context answers "had this setup matched a call by the time the
 * context was opened?". Matches recorded later are invisible to it, and so
 * is a clear() of the log: the context keeps the index it captured.
 */

import { ContextDisposedError } from '../errors.js';
import type { RegisteredSetup } from '../setups/registered-setup.js';
import type { MatchedInvocationIndex } from './matched-index.js';

/**
 * Predicate supplied by the verification orchestrator. Returning true
 * excludes the setup from this pass (it counts as satisfied).
 */
export type SkipPredicate = (registered: RegisteredSetup) => boolean;

export class VerificationContext {
  private index: MatchedInvocationIndex | undefined;

  constructor(
    index: MatchedInvocationIndex,
    readonly version: number,
  ) {
    this.index = index;
  }

  get isDisposed(): boolean {
    return this.index === undefined;
  }

  /**
   * Whether `registered` matched some invocation at or before this
   * context's version. The matching invocation is marked verified.
   *
   * @param skip - Setups for which this returns true are reported as
   *   matched without consulting the index
   * @throws {ContextDisposedError} If called after dispose()
   */
  isMatchedByInvocation(registered: RegisteredSetup, skip: SkipPredicate): boolean {
    const index = this.index;
    if (index === undefined) {
      throw new ContextDisposedError();
    }

    if (skip(registered)) {
      return true;
    }

    const record = index.findAtOrBefore(registered.id, this.version);
    if (record === undefined) {
      return false;
    }
    record.invocation.markAsVerified();
    return true;
  }

  /**
   * Release the captured index. Idempotent; the context is unusable
   * afterwards.
   */
  dispose(): void {
    this.index = undefined;
  }
}
