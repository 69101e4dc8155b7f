/**
 * @mockwork/kernel
 *
 * Mockwork call-dispatch and verification engine: setup registry,
 * invocation log, verification contexts, dispatcher, verifier, and the
 * dispatch log contract.
 *
 * This package is side-effect free. It performs no I/O; log persistence is
 * injected through LogSink (see @mockwork/runtime-host).
 */

// Types
export type { CallOutcome, CallSignature, Invocation } from './types/invocation.js';
export type { ExpectationKey, Setup, SetupCondition } from './types/setup.js';
export { NESTED_MOCK_KINDS, SetupKind } from './types/setup.js';
export type { DispatchEntry, DispatchLogEntry, VerificationEntry } from './types/log.js';
export { MockBehavior } from './types/log.js';
export type { ValidationError, ValidationResult } from './types/validation.js';

// Errors
export type { MockErrorCode } from './errors.js';
export { ContextDisposedError, InvocationIndexError, MockError } from './errors.js';

// Setup registry
export type { SetupId, SetupMatch } from './setups/registered-setup.js';
export {
  NOT_REGISTERED,
  NOT_REGISTERED_ID,
  RegisteredSetup,
  matchedSetupId,
} from './setups/registered-setup.js';
export { OverrideMask } from './setups/override-mask.js';
export { SetupRegistry } from './setups/setup-registry.js';

// Invocation log
export { RecordedCall } from './invocations/recorded-call.js';
export type { MatchRecord } from './invocations/matched-index.js';
export { MatchedInvocationIndex } from './invocations/matched-index.js';
export { INITIAL_CAPACITY, InvocationLog } from './invocations/invocation-log.js';
export type { SkipPredicate } from './invocations/verification-context.js';
export { VerificationContext } from './invocations/verification-context.js';

// Dispatch and verification
export { MockState } from './dispatch/mock-state.js';
export type { DispatchResult } from './dispatch/call-dispatcher.js';
export { CallDispatcher } from './dispatch/call-dispatcher.js';
export { Times } from './verification/times.js';
export type {
  VerificationFailure,
  VerificationResult,
  VerifyAllOptions,
} from './verification/verifier.js';
export { Verifier, assertVerified, describeFailure } from './verification/verifier.js';

// Logging (sink implementations live in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export type { Clock } from './logging/dispatch-log.js';
export { DispatchLogger, systemClock } from './logging/dispatch-log.js';
