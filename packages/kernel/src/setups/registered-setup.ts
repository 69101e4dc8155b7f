/**
 * Mockwork Kernel — Registered Setup
 *
 * A Setup as stored by the SetupRegistry: the setup itself, the id the
 * registry assigned to it, and whether it owns a nested mock.
 */

import { NESTED_MOCK_KINDS } from '../types/setup.js';
import type { Setup } from '../types/setup.js';

/**
 * Registry-assigned setup identifier.
 *
 * Dense and zero-based in registration order. Never reused within one
 * registry, not even after clear().
 */
export type SetupId = number;

/** Id written to logs for calls no setup governed. */
export const NOT_REGISTERED_ID = -1;

export class RegisteredSetup {
  /**
   * True iff the wrapped setup is of a kind that owns a nested mock.
   * Computed once; the setup kind never changes.
   */
  readonly canVerify: boolean;

  constructor(
    readonly id: SetupId,
    readonly setup: Setup,
  ) {
    this.canVerify = NESTED_MOCK_KINDS.has(setup.kind);
  }
}

// ---------------------------------------------------------------------------
// Setup Match
// ---------------------------------------------------------------------------

/**
 * Result of SetupRegistry.findMatchFor().
 *
 * `not-registered` is an ordinary result, not an error: the caller decides
 * what an ungoverned call means (strict mocks throw, loose mocks return a
 * default).
 */
export type SetupMatch =
  | { readonly kind: 'registered'; readonly registered: RegisteredSetup }
  | { readonly kind: 'not-registered' };

/** The single "no governing setup" value. */
export const NOT_REGISTERED: SetupMatch = Object.freeze({ kind: 'not-registered' });

export function registeredMatch(registered: RegisteredSetup): SetupMatch {
  return { kind: 'registered', registered };
}

/** Id of the governing setup, or NOT_REGISTERED_ID. */
export function matchedSetupId(match: SetupMatch): SetupId {
  return match.kind === 'registered' ? match.registered.id : NOT_REGISTERED_ID;
}
