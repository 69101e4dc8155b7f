/**
 * Mockwork Kernel — Setup Registry
 *
 * Ordered, append-only collection of the setups registered on one mock.
 *
 * Registry invariants:
 * - Ids are dense, zero-based, and assigned in registration order
 * - An id is never reassigned, not even after clear()
 * - Newer setups take precedence over older ones (recency wins)
 * - An unguarded setup is overridden by any newer unguarded setup with the
 *   same expectation key; guarded setups never override and are never
 *   overridden
 *
 * Every operation runs synchronously to completion, so each one is atomic
 * with respect to the others. Setup predicates may re-enter the registry
 * while a scan is running; scans therefore work on the entry list and mask
 * captured when they start, and clear() swaps both out instead of
 * truncating them.
 */

import type { Invocation } from '../types/invocation.js';
import type { ExpectationKey, Setup } from '../types/setup.js';
import { OverrideMask } from './override-mask.js';
import {
  NOT_REGISTERED,
  RegisteredSetup,
  registeredMatch,
} from './registered-setup.js';
import type { SetupMatch } from './registered-setup.js';

export class SetupRegistry {
  private entries: RegisteredSetup[] = [];
  private overridden: OverrideMask = new OverrideMask();
  private nextId = 0;

  /** Number of setups currently registered, overridden ones included. */
  get count(): number {
    return this.entries.length;
  }

  /**
   * Register a setup. It becomes the most recent one.
   *
   * @returns The registered entry, carrying its newly assigned id
   */
  add(setup: Setup): RegisteredSetup {
    const registered = new RegisteredSetup(this.nextId++, setup);
    this.entries.push(registered);
    return registered;
  }

  /**
   * True if any registered setup satisfies `predicate`, whether or not it
   * has been overridden.
   */
  any(predicate: (setup: Setup) => boolean): boolean {
    return this.entries.some((r) => predicate(r.setup));
  }

  /**
   * Drop every setup and every override mark.
   *
   * Scans already running keep the list they captured.
   */
  clear(): void {
    this.entries = [];
    this.overridden = new OverrideMask();
  }

  /**
   * Find the setup that governs `call`.
   *
   * Scans non-overridden setups from newest to oldest. The first setup
   * whose predicate matches becomes the candidate. An older setup can
   * still displace the candidate, but only if it was declared against the
   * very signature that was called, so older setups with another signature
   * are skipped without running their predicate. The scan ends as soon as
   * a setup with the called signature matches.
   *
   * @returns The governing setup, or NOT_REGISTERED
   */
  findMatchFor(call: Invocation): SetupMatch {
    const entries = this.entries;
    if (entries.length === 0) {
      return NOT_REGISTERED;
    }

    const overridden = this.overridden;
    let match: SetupMatch = NOT_REGISTERED;

    for (let i = entries.length - 1; i >= 0; i--) {
      if (overridden.has(i)) continue;
      const registered = entries[i];
      if (registered === undefined) continue;
      const { setup } = registered;

      // Cheap signature comparison first; matches() may be expensive.
      if (match.kind === 'not-registered') {
        if (setup.matches(call)) {
          match = registeredMatch(registered);
          if (setup.method === call.method) break;
        }
      } else if (setup.method === call.method && setup.matches(call)) {
        match = registeredMatch(registered);
        break;
      }
    }

    return match;
  }

  /**
   * Live setups satisfying `predicate`, newest first.
   *
   * An unguarded setup is live unless a newer unguarded setup shares its
   * expectation key. Guarded setups are always live: their guard decides
   * at call time whether they apply, so they neither shadow nor get
   * shadowed by identity. Overridden setups found on the way are flagged
   * so later scans skip them outright.
   */
  toArrayLive(predicate: (setup: Setup) => boolean): ReadonlyArray<RegisteredSetup> {
    const entries = this.entries;
    const overridden = this.overridden;
    const seen = new Set<ExpectationKey>();
    const live: RegisteredSetup[] = [];

    for (let i = entries.length - 1; i >= 0; i--) {
      if (overridden.has(i)) continue;
      const registered = entries[i];
      if (registered === undefined) continue;
      const { setup } = registered;

      if (setup.condition === undefined) {
        if (seen.has(setup.expectation)) {
          overridden.mark(i);
          continue;
        }
        seen.add(setup.expectation);
      }

      if (predicate(setup)) {
        live.push(registered);
      }
    }

    return live;
  }

  /**
   * Live setups that produce a nested mock, newest first.
   * Used by recursive verification.
   */
  getInnerMockSetups(): ReadonlyArray<RegisteredSetup> {
    return this.toArrayLive((setup) => setup.returnsInnerMock() !== undefined);
  }
}
