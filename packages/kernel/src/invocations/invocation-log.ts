/**
 * Mockwork Kernel — Invocation Log
 *
 * Growable log of the calls observed on one mock, plus the index of which
 * setup matched which call.
 *
 * Log invariants:
 * - Invocations are kept in the order add() was called
 * - count <= capacity; capacity goes 0 → 4 → 8 → 16 → … and only returns
 *   to 0 through clear()
 * - Match versions strictly increase in recordMatchedInvocation() order and
 *   survive clear(); a version is never issued twice
 * - A backing array that has been handed to an iteration or a verification
 *   context is never written again: growth copies into a new array and
 *   clear() swaps in fresh state
 *
 * The last invariant is what lets an iteration suspended between next()
 * calls keep yielding exactly the entries it started with, whatever is
 * appended or cleared in the meantime.
 */

import { InvocationIndexError } from '../errors.js';
import type { Invocation } from '../types/invocation.js';
import type { SetupId } from '../setups/registered-setup.js';
import { MatchedInvocationIndex } from './matched-index.js';
import { VerificationContext } from './verification-context.js';

/** Capacity allocated by the first add() after construction or clear(). */
export const INITIAL_CAPACITY = 4;

export class InvocationLog implements Iterable<Invocation> {
  private buffer: Array<Invocation | undefined> = [];
  private size = 0;
  private allocated = 0;
  private matched: MatchedInvocationIndex = new MatchedInvocationIndex();
  private currentVersion = 0;

  /** Number of invocations in the log. */
  get count(): number {
    return this.size;
  }

  /** Slots allocated in the current backing array. */
  get capacity(): number {
    return this.allocated;
  }

  /** The most recently issued match version (0 before the first match). */
  get version(): number {
    return this.currentVersion;
  }

  /**
   * Append an invocation.
   */
  add(invocation: Invocation): void {
    if (this.size === this.allocated) {
      this.grow();
    }
    this.buffer[this.size] = invocation;
    this.size++;
  }

  /**
   * The invocation at `index`, in insertion order.
   *
   * @throws {InvocationIndexError} If `index` is not an integer in `[0, count)`
   */
  at(index: number): Invocation {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new InvocationIndexError(index, this.size);
    }
    const invocation = this.buffer[index];
    if (invocation === undefined) {
      throw new InvocationIndexError(index, this.size);
    }
    return invocation;
  }

  /**
   * Record that setup `setupId` governed `invocation`.
   *
   * @returns The freshly issued version under which the match was recorded
   */
  recordMatchedInvocation(setupId: SetupId, invocation: Invocation): number {
    const version = ++this.currentVersion;
    this.matched.record(setupId, version, invocation);
    return version;
  }

  /**
   * Forget every invocation and every recorded match.
   *
   * The version counter keeps running. Iterations and verification
   * contexts opened before the clear still see the old state.
   */
  clear(): void {
    this.buffer = [];
    this.matched = new MatchedInvocationIndex();
    this.size = 0;
    this.allocated = 0;
  }

  /** Copy of the current entries. */
  toArray(): Invocation[];
  /** Copy of the current entries that satisfy `predicate`. */
  toArray(predicate: (invocation: Invocation) => boolean): Invocation[];
  toArray(predicate?: (invocation: Invocation) => boolean): Invocation[] {
    const buffer = this.buffer;
    const size = this.size;
    const result: Invocation[] = [];
    for (let i = 0; i < size; i++) {
      const invocation = buffer[i];
      if (invocation === undefined) continue;
      if (predicate === undefined || predicate(invocation)) {
        result.push(invocation);
      }
    }
    return result;
  }

  /**
   * Iterate the entries present when iteration starts.
   *
   * The backing array and count are captured on the first next() call.
   */
  *[Symbol.iterator](): Iterator<Invocation> {
    const buffer = this.buffer;
    const size = this.size;
    for (let i = 0; i < size; i++) {
      const invocation = buffer[i];
      if (invocation !== undefined) {
        yield invocation;
      }
    }
  }

  /**
   * Open a point-in-time view of the matched-invocation index for one
   * verification pass. Dispose it when the pass is done.
   */
  asInvocationContext(): VerificationContext {
    return new VerificationContext(this.matched, this.currentVersion);
  }

  private grow(): void {
    const target = this.allocated === 0 ? INITIAL_CAPACITY : this.allocated * 2;
    const next = new Array<Invocation | undefined>(target);
    for (let i = 0; i < this.size; i++) {
      next[i] = this.buffer[i];
    }
    this.buffer = next;
    this.allocated = target;
  }
}
