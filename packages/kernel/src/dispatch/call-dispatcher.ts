/**
 * Mockwork Kernel — Call Dispatcher
 *
 * Entry point for the interception layer. Every intercepted call goes
 * through dispatch(), which:
 *
 * 1. Resolves the governing setup via SetupRegistry.findMatchFor()
 * 2. Appends the call to the mock's InvocationLog
 * 3. Records the (setup, call) match under a fresh version, if any
 * 4. Hands a dispatch entry to the DispatchLogger
 *
 * Steps 2–4 happen whatever the outcome. Only then does a strict mock fail
 * an ungoverned call.
 */

import { MockError } from '../errors.js';
import type { Clock } from '../logging/dispatch-log.js';
import { DispatchLogger } from '../logging/dispatch-log.js';
import type { LogSink } from '../logging/log-sink.js';
import { matchedSetupId } from '../setups/registered-setup.js';
import type { SetupMatch } from '../setups/registered-setup.js';
import type { Invocation } from '../types/invocation.js';
import { MockBehavior } from '../types/log.js';
import type { MockState } from './mock-state.js';

export interface DispatchResult {
  readonly match: SetupMatch;
  /** Version the match was recorded under; null when no setup matched. */
  readonly version: number | null;
}

export class CallDispatcher {
  private readonly logger: DispatchLogger;

  constructor(logSink?: LogSink, clock?: Clock) {
    this.logger = new DispatchLogger(logSink, clock);
  }

  /**
   * Dispatch one intercepted call on `mock`.
   *
   * @throws {MockError} STRICT_UNMATCHED_CALL if `mock` is strict and no
   *   setup governs the call. The call has been logged by then.
   */
  dispatch(mock: MockState, call: Invocation): DispatchResult {
    const match = mock.setups.findMatchFor(call);

    mock.invocations.add(call);

    const version =
      match.kind === 'registered'
        ? mock.invocations.recordMatchedInvocation(match.registered.id, call)
        : null;

    this.logger.recordDispatch({
      mock: mock.name,
      method: call.method,
      arity: call.args.length,
      setupId: matchedSetupId(match),
      version,
      behavior: mock.behavior,
    });

    if (match.kind === 'not-registered' && mock.behavior === MockBehavior.Strict) {
      throw new MockError(
        'STRICT_UNMATCHED_CALL',
        `${mock.name}.${call.method} was called with ${call.args.length} argument(s), ` +
          `but no setup matches. Strict mocks require a setup for every call.`,
      );
    }

    return { match, version };
  }
}
