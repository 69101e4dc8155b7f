/**
 * Shared test fixtures for kernel tests.
 *
 * FakeSetup is a Setup whose predicate is supplied by the test and whose
 * predicate calls are counted, so tests can assert which setups the
 * registry actually evaluated.
 */

import { SetupKind } from '../src/index.js';
import type {
  CallSignature,
  Invocation,
  LogSink,
  DispatchLogEntry,
  MockState,
  Setup,
  SetupCondition,
} from '../src/index.js';

export interface FakeSetupOptions {
  readonly method: CallSignature;
  /** Defaults to `method`. */
  readonly expectation?: string | undefined;
  /** Defaults to "call.method === method". */
  readonly matches?: ((call: Invocation) => boolean) | undefined;
  readonly condition?: SetupCondition | undefined;
  readonly kind?: SetupKind | undefined;
  readonly innerMock?: MockState | undefined;
}

export class FakeSetup implements Setup {
  readonly kind: SetupKind;
  readonly method: CallSignature;
  readonly condition: SetupCondition | undefined;
  readonly expectation: string;
  /** Number of times matches() ran. */
  matchCalls = 0;
  private readonly predicate: (call: Invocation) => boolean;
  private readonly innerMock: MockState | undefined;

  constructor(options: FakeSetupOptions) {
    this.method = options.method;
    this.kind = options.kind ?? SetupKind.Method;
    this.condition = options.condition;
    this.expectation = options.expectation ?? options.method;
    const method = options.method;
    this.predicate = options.matches ?? ((call) => call.method === method);
    this.innerMock = options.innerMock;
  }

  matches(call: Invocation): boolean {
    this.matchCalls++;
    return this.predicate(call);
  }

  returnsInnerMock(): MockState | undefined {
    return this.innerMock;
  }
}

/** Guard that always holds. */
export const ALWAYS: SetupCondition = { isTrue: () => true };

/** LogSink that keeps entries in memory. */
export class MemorySink implements LogSink {
  readonly entries: DispatchLogEntry[] = [];

  append(entry: DispatchLogEntry): void {
    this.entries.push(entry);
  }
}

export const FIXED_CLOCK = (): string => '2026-01-01T00:00:00.000Z';
