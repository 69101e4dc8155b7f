/**
 * Mockwork Kernel — Verifier
 *
 * Verification orchestrator: answers "were the expectations on this mock
 * met?" on top of the setup registry, the invocation log and verification
 * contexts.
 *
 * Results are data (VerificationResult). Turning a failed result into an
 * exception is left to assertVerified(); presenting failures is left to
 * the caller.
 */

import { MockError } from '../errors.js';
import type { MockState } from '../dispatch/mock-state.js';
import type { Clock } from '../logging/dispatch-log.js';
import { DispatchLogger } from '../logging/dispatch-log.js';
import type { LogSink } from '../logging/log-sink.js';
import type { SkipPredicate } from '../invocations/verification-context.js';
import type { Invocation, CallSignature } from '../types/invocation.js';
import type { SetupId } from '../setups/registered-setup.js';
import type { Setup } from '../types/setup.js';
import type { Times } from './times.js';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export type VerificationFailure =
  | {
      readonly kind: 'unmatched-setup';
      readonly mock: string;
      readonly setupId: SetupId;
      readonly method: CallSignature;
      readonly expectation: string;
    }
  | {
      readonly kind: 'call-count';
      readonly mock: string;
      readonly description: string;
      readonly expected: string;
      readonly actual: number;
    }
  | {
      readonly kind: 'unverified-call';
      readonly mock: string;
      readonly method: CallSignature;
      /** Position of the call in the mock's invocation log. */
      readonly index: number;
    };

export type VerificationResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly failures: ReadonlyArray<VerificationFailure> };

export interface VerifyAllOptions {
  /** Setups for which this returns true are treated as satisfied. */
  readonly dontVerify?: SkipPredicate | undefined;
}

const VERIFY_EVERYTHING: SkipPredicate = () => false;

// A guarded setup may legitimately never apply.
const isUnguarded = (setup: Setup): boolean => setup.condition === undefined;

// ---------------------------------------------------------------------------
// Verifier
// ---------------------------------------------------------------------------

export class Verifier {
  private readonly logger: DispatchLogger;

  constructor(logSink?: LogSink, clock?: Clock) {
    this.logger = new DispatchLogger(logSink, clock);
  }

  /**
   * Check that every live, unguarded setup on `mock` matched at least one
   * call, descending into the nested mocks of setups that own one.
   *
   * Each mock is visited once per run, so mocks that reference each other
   * do not loop. Matching calls are marked verified.
   */
  verifyAll(mock: MockState, options: VerifyAllOptions = {}): VerificationResult {
    const skip = options.dontVerify ?? VERIFY_EVERYTHING;
    const failures: VerificationFailure[] = [];
    this.verifyTree(mock, skip, new Set<MockState>(), failures);
    this.logger.recordVerification(mock.name, 'verifyAll', failures.length);
    return toResult(failures);
  }

  /**
   * Check how many logged calls on `mock` satisfy `predicate`. Every such
   * call is marked verified, whether or not the count is acceptable.
   *
   * @param description - Names the checked calls in the failure report
   */
  verifyCalls(
    mock: MockState,
    predicate: (invocation: Invocation) => boolean,
    times: Times,
    description = 'matching calls',
  ): VerificationResult {
    const calls = mock.invocations.toArray(predicate);
    for (const call of calls) {
      call.markAsVerified();
    }

    const failures: VerificationFailure[] = times.allows(calls.length)
      ? []
      : [
          {
            kind: 'call-count',
            mock: mock.name,
            description,
            expected: times.toString(),
            actual: calls.length,
          },
        ];
    this.logger.recordVerification(mock.name, 'verifyCalls', failures.length);
    return toResult(failures);
  }

  /**
   * Check that no call on `mock` is left unaccounted for by earlier
   * verifications.
   */
  verifyNoOtherCalls(mock: MockState): VerificationResult {
    const failures: VerificationFailure[] = [];
    let index = 0;
    for (const call of mock.invocations) {
      if (!call.isVerified) {
        failures.push({ kind: 'unverified-call', mock: mock.name, method: call.method, index });
      }
      index++;
    }
    this.logger.recordVerification(mock.name, 'verifyNoOtherCalls', failures.length);
    return toResult(failures);
  }

  private verifyTree(
    mock: MockState,
    skip: SkipPredicate,
    visited: Set<MockState>,
    failures: VerificationFailure[],
  ): void {
    if (visited.has(mock)) return;
    visited.add(mock);

    const inner: MockState[] = [];
    const context = mock.invocations.asInvocationContext();
    try {
      for (const registered of mock.setups.toArrayLive(isUnguarded)) {
        if (!context.isMatchedByInvocation(registered, skip)) {
          failures.push({
            kind: 'unmatched-setup',
            mock: mock.name,
            setupId: registered.id,
            method: registered.setup.method,
            expectation: registered.setup.expectation,
          });
        }
        if (registered.canVerify) {
          const nested = registered.setup.returnsInnerMock();
          if (nested !== undefined) inner.push(nested);
        }
      }
    } finally {
      context.dispose();
    }

    for (const nested of inner) {
      this.verifyTree(nested, skip, visited, failures);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toResult(failures: ReadonlyArray<VerificationFailure>): VerificationResult {
  return failures.length === 0 ? { ok: true } : { ok: false, failures };
}

/** One-line description of a failure. */
export function describeFailure(failure: VerificationFailure): string {
  switch (failure.kind) {
    case 'unmatched-setup':
      return `${failure.mock}: setup #${failure.setupId} (${failure.expectation}) was never matched`;
    case 'call-count':
      return `${failure.mock}: expected ${failure.description} ${failure.expected}, got ${failure.actual}`;
    case 'unverified-call':
      return `${failure.mock}: call #${failure.index} to ${failure.method} was not verified`;
  }
}

/**
 * Throw if `result` reports failures.
 *
 * @throws {MockError} VERIFICATION_FAILED, one failure per message line
 */
export function assertVerified(result: VerificationResult): void {
  if (result.ok) return;
  throw new MockError(
    'VERIFICATION_FAILED',
    ['Verification failed:', ...result.failures.map((f) => `  ${describeFailure(f)}`)].join('\n'),
  );
}
