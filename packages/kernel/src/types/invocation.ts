/**
 * Mockwork Kernel — Invocation Types
 *
 * An Invocation is the record of one observed call to an intercepted call
 * site. Invocations are created by the interception layer and handed to the
 * InvocationLog, which owns them from then on. The kernel reads invocations
 * and flips their verified marker; it never copies or otherwise mutates them.
 */

// ---------------------------------------------------------------------------
// Call Signature
// ---------------------------------------------------------------------------

/**
 * Identity of a call site.
 *
 * Two signatures are the same call site iff they are string-equal. The
 * interception layer chooses the format; the CLI scenario runner uses
 * `name/arity` (e.g. `add/2`).
 */
export type CallSignature = string;

// ---------------------------------------------------------------------------
// Call Outcome
// ---------------------------------------------------------------------------

/**
 * How an intercepted call ended. Absent until the interception layer
 * completes the call.
 */
export type CallOutcome =
  | { readonly kind: 'returned'; readonly value: unknown }
  | { readonly kind: 'threw'; readonly error: unknown };

// ---------------------------------------------------------------------------
// Invocation
// ---------------------------------------------------------------------------

/**
 * One observed call.
 *
 * `isVerified` starts false and becomes true, once and for all, when a
 * verification pass confirms the call satisfied some setup.
 */
export interface Invocation {
  /** Signature of the call site that was invoked. */
  readonly method: CallSignature;
  /** Arguments exactly as the caller passed them. */
  readonly args: ReadonlyArray<unknown>;
  /** Outcome of the call, once known. */
  readonly outcome: CallOutcome | undefined;
  /** True once a verification pass has accounted for this call. */
  readonly isVerified: boolean;
  /** Flip the verified marker. Idempotent. */
  markAsVerified(): void;
}
