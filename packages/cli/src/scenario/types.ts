/**
 * Mockwork CLI — Scenario Types
 *
 * A scenario is a JSON document describing mocks, their setups, and an
 * ordered list of steps (calls, further setups, resets, verifications)
 * replayed through the kernel by `mockwork replay`.
 *
 * Signatures are written `name/arity`. A setup may instead name only the
 * method (`name`), in which case it matches calls of any arity and takes
 * no argument list.
 */

import type { MockBehavior, SetupKind } from '@mockwork/kernel';

/** Argument matcher that accepts any value. */
export interface AnyArgument {
  readonly $any: true;
}

export interface ScenarioSetupSpec {
  /** `name/arity`, or `name` for a setup matching every arity. */
  readonly method: string;
  /** Expected arguments; required with `name/arity`, absent with `name`. */
  readonly args?: ReadonlyArray<unknown> | undefined;
  /** Value returned by calls this setup governs. */
  readonly returns?: unknown;
  /** Error message thrown by calls this setup governs. */
  readonly throws?: string | undefined;
  /** Guard value. A guarded setup only matches while its guard is true. */
  readonly guard?: boolean | undefined;
  readonly kind?: SetupKind | undefined;
  /** Name of the mock this setup hands out. */
  readonly innerMock?: string | undefined;
}

export interface ScenarioMock {
  readonly name: string;
  /** Defaults to the configured default behavior. */
  readonly behavior?: MockBehavior | undefined;
  readonly setups: ReadonlyArray<ScenarioSetupSpec>;
}

export type TimesSpec =
  | 'never'
  | 'once'
  | { readonly exactly: number }
  | { readonly atLeast: number }
  | { readonly atMost: number }
  | { readonly between: readonly [number, number] };

export type ScenarioStep =
  | {
      readonly type: 'call';
      readonly mock: string;
      /** Method name only; the signature is derived from the argument count. */
      readonly method: string;
      readonly args: ReadonlyArray<unknown>;
    }
  | ({ readonly type: 'setup'; readonly mock: string } & ScenarioSetupSpec)
  | { readonly type: 'reset'; readonly mock: string }
  | {
      readonly type: 'verifyAll';
      readonly mock: string;
      /** Setup methods (as written in the setup) to leave unverified. */
      readonly dontVerify?: ReadonlyArray<string> | undefined;
    }
  | {
      readonly type: 'verifyCalls';
      readonly mock: string;
      /** `name/arity` */
      readonly method: string;
      /** Argument matchers; all calls to `method` count when absent. */
      readonly args?: ReadonlyArray<unknown> | undefined;
      readonly times: TimesSpec;
    }
  | { readonly type: 'verifyNoOtherCalls'; readonly mock: string };

export interface Scenario {
  readonly name?: string | undefined;
  readonly mocks: ReadonlyArray<ScenarioMock>;
  readonly steps: ReadonlyArray<ScenarioStep>;
}
