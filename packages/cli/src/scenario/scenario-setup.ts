/**
 * Mockwork CLI — Scenario Setup
 *
 * The Setup implementation behind scenario files: matches calls by
 * signature and by argument values, with `{ "$any": true }` accepting any
 * argument.
 *
 * The expectation identity is the canonical JSON of the method and the
 * argument matchers, so two setups written identically override each
 * other regardless of key order inside argument objects.
 */

import { NESTED_MOCK_KINDS, SetupKind } from '@mockwork/kernel';
import type {
  CallOutcome,
  CallSignature,
  ExpectationKey,
  Invocation,
  MockState,
  Setup,
  SetupCondition,
} from '@mockwork/kernel';
import { canonicalize } from './canonical.js';
import type { AnyArgument, ScenarioSetupSpec } from './types.js';

/** Resolves a mock name to its state within one replay. */
export type MockLookup = (name: string) => MockState | undefined;

export function isAnyArgument(value: unknown): value is AnyArgument {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    '$any' in value &&
    value.$any === true
  );
}

/**
 * Whether `actual` satisfies the matchers in `expected`, position by
 * position. Lengths must agree.
 */
export function argumentsMatch(
  expected: ReadonlyArray<unknown>,
  actual: ReadonlyArray<unknown>,
): boolean {
  if (expected.length !== actual.length) return false;
  return expected.every(
    (matcher, i) => isAnyArgument(matcher) || canonicalize(matcher) === canonicalize(actual[i]),
  );
}

/** `name/arity` signature of a call with `arity` arguments. */
export function signatureOf(name: string, arity: number): CallSignature {
  return `${name}/${arity}`;
}

export class ScenarioSetup implements Setup {
  readonly kind: SetupKind;
  readonly method: CallSignature;
  readonly condition: SetupCondition | undefined;
  readonly expectation: ExpectationKey;
  private readonly args: ReadonlyArray<unknown> | undefined;

  constructor(
    private readonly spec: ScenarioSetupSpec,
    private readonly lookup: MockLookup,
  ) {
    this.method = spec.method;
    this.args = spec.args;
    this.kind =
      spec.kind ?? (spec.innerMock !== undefined ? SetupKind.InnerMock : SetupKind.Method);
    const guard = spec.guard;
    this.condition = guard === undefined ? undefined : { isTrue: () => guard };
    this.expectation = canonicalize({ method: spec.method, args: spec.args ?? null });
  }

  /**
   * Signature and arguments must match, and the guard, if any, must hold.
   * A setup declared by name alone matches every call to that name.
   */
  matches(call: Invocation): boolean {
    if (this.condition !== undefined && !this.condition.isTrue()) {
      return false;
    }
    if (this.args === undefined) {
      return nameOf(call.method) === this.method;
    }
    return call.method === this.method && argumentsMatch(this.args, call.args);
  }

  returnsInnerMock(): MockState | undefined {
    if (this.spec.innerMock === undefined || !NESTED_MOCK_KINDS.has(this.kind)) {
      return undefined;
    }
    return this.lookup(this.spec.innerMock);
  }

  /** How a call governed by this setup ends. */
  respond(): CallOutcome {
    if (this.spec.throws !== undefined) {
      return { kind: 'threw', error: new Error(this.spec.throws) };
    }
    if (this.spec.innerMock !== undefined) {
      return { kind: 'returned', value: { $mock: this.spec.innerMock } };
    }
    return { kind: 'returned', value: this.spec.returns };
  }
}

function nameOf(signature: CallSignature): string {
  const slash = signature.lastIndexOf('/');
  return slash === -1 ? signature : signature.slice(0, slash);
}
