/**
 * Mockwork CLI — Scenario Runner
 *
 * Replays a validated Scenario through the kernel: builds one MockState per
 * declared mock, registers setups, dispatches calls through a
 * CallDispatcher and runs verification steps through a Verifier. Both
 * share the injected LogSink and clock.
 *
 * A strict mock rejecting a call is reported as a step outcome, not a
 * failure of the run. The run passes when every verification step passes.
 */

import {
  CallDispatcher,
  MockBehavior,
  MockError,
  MockState,
  RecordedCall,
  Times,
  Verifier,
  describeFailure,
} from '@mockwork/kernel';
import type {
  CallOutcome,
  Clock,
  DispatchResult,
  LogSink,
  VerificationResult,
} from '@mockwork/kernel';
import { ScenarioSetup, argumentsMatch, signatureOf } from './scenario-setup.js';
import type { Scenario, ScenarioStep, TimesSpec } from './types.js';

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export type CallStepOutcome = 'matched' | 'unmatched' | 'rejected';

export type StepReport =
  | {
      readonly type: 'call';
      readonly step: number;
      readonly mock: string;
      readonly method: string;
      readonly outcome: CallStepOutcome;
      /** Governing setup, or -1. */
      readonly setupId: number;
      readonly version: number | null;
      /** Present when the call returned. */
      readonly returned?: unknown;
      /** Present when the call threw or was rejected. */
      readonly error?: string | undefined;
    }
  | {
      readonly type: 'setup';
      readonly step: number;
      readonly mock: string;
      readonly method: string;
      readonly setupId: number;
    }
  | { readonly type: 'reset'; readonly step: number; readonly mock: string }
  | {
      readonly type: 'verification';
      readonly step: number;
      readonly mock: string;
      readonly operation: 'verifyAll' | 'verifyCalls' | 'verifyNoOtherCalls';
      readonly passed: boolean;
      readonly failures: ReadonlyArray<string>;
    };

export interface ScenarioReport {
  readonly name: string | undefined;
  readonly steps: ReadonlyArray<StepReport>;
  /** True when every verification step passed. */
  readonly passed: boolean;
}

export interface RunOptions {
  readonly logSink?: LogSink | undefined;
  readonly clock?: Clock | undefined;
  /** Behavior of mocks that do not declare one. Defaults to Loose. */
  readonly defaultBehavior?: MockBehavior | undefined;
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export function toTimes(spec: TimesSpec): Times {
  if (spec === 'never') return Times.never();
  if (spec === 'once') return Times.once();
  if ('exactly' in spec) return Times.exactly(spec.exactly);
  if ('atLeast' in spec) return Times.atLeast(spec.atLeast);
  if ('atMost' in spec) return Times.atMost(spec.atMost);
  return Times.between(spec.between[0], spec.between[1]);
}

class ScenarioRun {
  private readonly mocks = new Map<string, MockState>();
  private readonly setups = new Map<MockState, Map<number, ScenarioSetup>>();
  private readonly dispatcher: CallDispatcher;
  private readonly verifier: Verifier;

  constructor(scenario: Scenario, options: RunOptions) {
    this.dispatcher = new CallDispatcher(options.logSink, options.clock);
    this.verifier = new Verifier(options.logSink, options.clock);
    const behavior = options.defaultBehavior ?? MockBehavior.Loose;

    for (const spec of scenario.mocks) {
      const mock = new MockState(spec.name, spec.behavior ?? behavior);
      this.mocks.set(spec.name, mock);
      this.setups.set(mock, new Map());
    }
    for (const spec of scenario.mocks) {
      const mock = this.mock(spec.name);
      for (const setup of spec.setups) {
        this.register(mock, new ScenarioSetup(setup, (name) => this.mocks.get(name)));
      }
    }
  }

  run(step: ScenarioStep, index: number): StepReport {
    const mock = this.mock(step.mock);
    switch (step.type) {
      case 'call':
        return this.call(mock, step.method, step.args, index);
      case 'setup': {
        const setup = new ScenarioSetup(step, (name) => this.mocks.get(name));
        const setupId = this.register(mock, setup);
        return { type: 'setup', step: index, mock: mock.name, method: setup.method, setupId };
      }
      case 'reset':
        mock.reset();
        this.setups.set(mock, new Map());
        return { type: 'reset', step: index, mock: mock.name };
      case 'verifyAll': {
        const skipped = new Set(step.dontVerify ?? []);
        const result = this.verifier.verifyAll(mock, {
          dontVerify: (registered) => skipped.has(registered.setup.method),
        });
        return verification(index, mock, 'verifyAll', result);
      }
      case 'verifyCalls': {
        const { method, args } = step;
        const result = this.verifier.verifyCalls(
          mock,
          (call) => call.method === method && (args === undefined || argumentsMatch(args, call.args)),
          toTimes(step.times),
          `calls to ${method}`,
        );
        return verification(index, mock, 'verifyCalls', result);
      }
      case 'verifyNoOtherCalls':
        return verification(index, mock, 'verifyNoOtherCalls', this.verifier.verifyNoOtherCalls(mock));
    }
  }

  private mock(name: string): MockState {
    const mock = this.mocks.get(name);
    if (mock === undefined) {
      throw new Error(`Scenario references undeclared mock "${name}"`);
    }
    return mock;
  }

  private register(mock: MockState, setup: ScenarioSetup): number {
    const registered = mock.setups.add(setup);
    this.setups.get(mock)?.set(registered.id, setup);
    return registered.id;
  }

  private call(
    mock: MockState,
    name: string,
    args: ReadonlyArray<unknown>,
    index: number,
  ): StepReport {
    const method = signatureOf(name, args.length);
    const call = new RecordedCall(method, args);
    const base = { type: 'call', step: index, mock: mock.name, method } as const;

    let result: DispatchResult;
    try {
      result = this.dispatcher.dispatch(mock, call);
    } catch (err: unknown) {
      if (!(err instanceof MockError)) throw err;
      call.complete({ kind: 'threw', error: err });
      return { ...base, outcome: 'rejected', setupId: -1, version: null, error: err.message };
    }

    if (result.match.kind === 'not-registered') {
      call.complete({ kind: 'returned', value: undefined });
      return { ...base, outcome: 'unmatched', setupId: -1, version: null, returned: undefined };
    }

    const setupId = result.match.registered.id;
    const setup = this.setups.get(mock)?.get(setupId);
    const outcome: CallOutcome = setup?.respond() ?? { kind: 'returned', value: undefined };
    call.complete(outcome);
    const common = { ...base, outcome: 'matched', setupId, version: result.version } as const;
    return outcome.kind === 'returned'
      ? { ...common, returned: outcome.value }
      : { ...common, error: errorMessage(outcome.error) };
  }
}

function verification(
  step: number,
  mock: MockState,
  operation: 'verifyAll' | 'verifyCalls' | 'verifyNoOtherCalls',
  result: VerificationResult,
): StepReport {
  return {
    type: 'verification',
    step,
    mock: mock.name,
    operation,
    passed: result.ok,
    failures: result.ok ? [] : result.failures.map(describeFailure),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Replay `scenario` and report every step.
 *
 * Steps are numbered from 1.
 */
export function runScenario(scenario: Scenario, options: RunOptions = {}): ScenarioReport {
  const run = new ScenarioRun(scenario, options);
  const steps = scenario.steps.map((step, i) => run.run(step, i + 1));
  return {
    name: scenario.name,
    steps,
    passed: steps.every((s) => s.type !== 'verification' || s.passed),
  };
}
