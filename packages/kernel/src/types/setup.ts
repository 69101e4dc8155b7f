/**
 * Mockwork Kernel — Setup Types
 *
 * A Setup is the declared behavior for a call site. Setups
 * are built outside the kernel (by whatever compiles a call pattern into a
 * predicate); the kernel only consumes the capabilities declared here.
 *
 * @see SetupRegistry for how setups shadow one another
 */

import type { CallSignature, Invocation } from './invocation.js';
import type { MockState } from '../dispatch/mock-state.js';

// ---------------------------------------------------------------------------
// Setup Kind
// ---------------------------------------------------------------------------

/**
 * The kinds of setup the kernel distinguishes.
 *
 * Only the kind matters to the kernel: the last three own a nested mock and
 * therefore take part in recursive verification (`RegisteredSetup.canVerify`).
 */
export enum SetupKind {
  /** A plain method or property setup. */
  Method = 'Method',
  /** A setup whose return value is another mock. */
  InnerMock = 'InnerMock',
  /** The getter half of an auto-implemented property. */
  AutoPropertyGetter = 'AutoPropertyGetter',
  /** The setter half of an auto-implemented property. */
  AutoPropertySetter = 'AutoPropertySetter',
}

/** Setup kinds that own a nested mock. */
export const NESTED_MOCK_KINDS: ReadonlySet<SetupKind> = new Set([
  SetupKind.InnerMock,
  SetupKind.AutoPropertyGetter,
  SetupKind.AutoPropertySetter,
]);

// ---------------------------------------------------------------------------
// Expectation identity
// ---------------------------------------------------------------------------

/**
 * Identity of the call pattern a setup was built from.
 *
 * Two unguarded setups with the same expectation key describe the same
 * expectation; the newer one overrides the older. Keys are compared with
 * string equality.
 */
export type ExpectationKey = string;

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Extra guard attached to a setup (e.g. "only while in state X").
 *
 * Its mere presence removes the setup from override detection; whether the
 * guard currently holds is the setup's own concern inside `matches`.
 */
export interface SetupCondition {
  isTrue(): boolean;
}

/**
 * Declared behavior for one call site.
 */
export interface Setup {
  readonly kind: SetupKind;
  /** Signature of the call site the setup was declared against. */
  readonly method: CallSignature;
  /** Optional guard. */
  readonly condition: SetupCondition | undefined;
  readonly expectation: ExpectationKey;
  /** Full match predicate. May be expensive. */
  matches(call: Invocation): boolean;
  /** The nested mock this setup produces, if any. */
  returnsInnerMock(): MockState | undefined;
}
