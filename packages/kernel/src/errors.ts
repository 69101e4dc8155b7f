/**
 * Mockwork Kernel — Error Types
 *
 * "No setup matched" is not an error in the kernel: it is the
 * NOT_REGISTERED value of SetupMatch. The classes below cover the remaining
 * failure modes.
 */

/**
 * Thrown by InvocationLog.at() for an index outside `[0, count)`.
 */
export class InvocationIndexError extends RangeError {
  constructor(
    readonly index: number,
    readonly count: number,
  ) {
    super(`Invocation index ${index} is out of range (count: ${count})`);
    this.name = 'InvocationIndexError';
  }
}

/**
 * Thrown when a VerificationContext is used after dispose().
 */
export class ContextDisposedError extends Error {
  constructor() {
    super('Verification context has been disposed');
    this.name = 'ContextDisposedError';
  }
}

/** Discriminant for MockError. */
export type MockErrorCode = 'STRICT_UNMATCHED_CALL' | 'VERIFICATION_FAILED';

/**
 * User-facing failure synthesized by the interception layer (strict
 * dispatch) or the verifier. Registry and log never throw it.
 */
export class MockError extends Error {
  constructor(
    readonly code: MockErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'MockError';
  }
}
