/**
 * Mockwork Kernel — Mock State
 *
 * Everything the kernel keeps for one mock object: its setups, its call
 * log, and how it treats calls no setup governs. The proxy that routes
 * calls here is built elsewhere.
 */

import { InvocationLog } from '../invocations/invocation-log.js';
import { SetupRegistry } from '../setups/setup-registry.js';
import { MockBehavior } from '../types/log.js';

export class MockState {
  readonly setups: SetupRegistry = new SetupRegistry();
  readonly invocations: InvocationLog = new InvocationLog();

  constructor(
    readonly name: string,
    readonly behavior: MockBehavior = MockBehavior.Loose,
  ) {}

  /** Forget all setups and all recorded calls. */
  reset(): void {
    this.setups.clear();
    this.invocations.clear();
  }
}
