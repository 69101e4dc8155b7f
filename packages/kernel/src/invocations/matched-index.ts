/**
 * Mockwork Kernel — Matched Invocation Index
 *
 * Records which invocation each setup matched, and when. "When" is a
 * version number issued by the owning InvocationLog; versions arrive in
 * strictly increasing order, so each per-setup list is sorted by
 * construction.
 *
 * The only lookup is one-directional: "the latest match of setup S whose
 * version is at or before V". There is deliberately no general equality on
 * (setup, version) pairs.
 */

import type { Invocation } from '../types/invocation.js';
import type { SetupId } from '../setups/registered-setup.js';

/** One recorded match. */
export interface MatchRecord {
  readonly version: number;
  readonly invocation: Invocation;
}

export class MatchedInvocationIndex {
  private readonly bySetup: Map<SetupId, MatchRecord[]> = new Map();
  private total = 0;

  /** Total number of recorded matches across all setups. */
  get size(): number {
    return this.total;
  }

  /**
   * Record that `invocation` matched `setupId` at `version`.
   *
   * @throws {RangeError} If `version` does not exceed the last version
   *   recorded for the same setup
   */
  record(setupId: SetupId, version: number, invocation: Invocation): void {
    const records = this.bySetup.get(setupId);
    if (records === undefined) {
      this.bySetup.set(setupId, [{ version, invocation }]);
    } else {
      const last = records[records.length - 1];
      if (last !== undefined && last.version >= version) {
        throw new RangeError(
          `Match version ${version} for setup ${setupId} does not follow version ${last.version}`,
        );
      }
      records.push({ version, invocation });
    }
    this.total++;
  }

  /**
   * The latest match of `setupId` recorded at or before `version`.
   *
   * @returns The match record, or undefined if the setup had not matched
   *   any invocation by then
   */
  findAtOrBefore(setupId: SetupId, version: number): MatchRecord | undefined {
    const records = this.bySetup.get(setupId);
    if (records === undefined) return undefined;

    // Binary search for the last record with record.version <= version.
    let lo = 0;
    let hi = records.length - 1;
    let found: MatchRecord | undefined;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const candidate = records[mid];
      if (candidate === undefined) break;
      if (candidate.version <= version) {
        found = candidate;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found;
  }

  /** All matches of `setupId`, oldest first. */
  matchesOf(setupId: SetupId): ReadonlyArray<MatchRecord> {
    return [...(this.bySetup.get(setupId) ?? [])];
  }
}
