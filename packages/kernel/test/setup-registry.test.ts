/**
 * Mockwork Kernel — Setup Registry Tests
 *
 * registry/recency: the newest matching setup governs a call
 * registry/exact-signature: an exact-signature match ends the scan
 * registry/signature-tier: once a candidate exists, older setups with a
 *   different signature are not evaluated
 * registry/override: duplicate expectations collapse to the newest, stably
 * registry/guarded: guarded setups never override or get overridden
 * registry/beyond-32: override detection holds past the 32nd setup
 * registry/empty: empty registry returns NOT_REGISTERED without evaluating anything
 *
 * Tests are pure: no I/O, no clock dependency.
 */

import { describe, it, expect } from 'vitest';
import {
  MockState,
  NOT_REGISTERED,
  RecordedCall,
  SetupKind,
  SetupRegistry,
} from '../src/index.js';
import type { SetupMatch } from '../src/index.js';
import { ALWAYS, FakeSetup } from './fixtures.js';

function idOf(match: SetupMatch): number {
  return match.kind === 'registered' ? match.registered.id : -1;
}

// ---------------------------------------------------------------------------
// add / ids
// ---------------------------------------------------------------------------

describe('registry: add()', () => {
  it('assigns dense zero-based ids in registration order', () => {
    const registry = new SetupRegistry();
    const ids = ['a/0', 'b/0', 'c/0'].map((m) => registry.add(new FakeSetup({ method: m })).id);
    expect(ids).toEqual([0, 1, 2]);
    expect(registry.count).toBe(3);
  });

  it('never reuses an id after clear()', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'a/0' }));
    registry.add(new FakeSetup({ method: 'b/0' }));
    registry.clear();

    const next = registry.add(new FakeSetup({ method: 'c/0' }));
    expect(next.id).toBe(2);
    expect(registry.count).toBe(1);
  });

  it('computes canVerify from the setup kind', () => {
    const registry = new SetupRegistry();
    const plain = registry.add(new FakeSetup({ method: 'a/0' }));
    const inner = registry.add(new FakeSetup({ method: 'b/0', kind: SetupKind.InnerMock }));
    const getter = registry.add(new FakeSetup({ method: 'c/0', kind: SetupKind.AutoPropertyGetter }));
    const setter = registry.add(new FakeSetup({ method: 'd/1', kind: SetupKind.AutoPropertySetter }));

    expect([plain.canVerify, inner.canVerify, getter.canVerify, setter.canVerify]).toEqual([
      false,
      true,
      true,
      true,
    ]);
  });
});

// ---------------------------------------------------------------------------
// findMatchFor
// ---------------------------------------------------------------------------

describe('registry: findMatchFor(): recency wins', () => {
  it('returns the newer of two setups that both match', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, *)' }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(*, 2)' }));

    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));
    expect(idOf(match)).toBe(1);
  });

  it('falls back to an older setup when the newer one does not match', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2' }));
    registry.add(new FakeSetup({ method: 'add/2', matches: () => false }));

    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));
    expect(idOf(match)).toBe(0);
  });

  it('returns NOT_REGISTERED when nothing matches', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2' }));

    expect(registry.findMatchFor(new RecordedCall('sub/2', [1, 2]))).toBe(NOT_REGISTERED);
  });
});

describe('registry: findMatchFor(): exact-signature short-circuit', () => {
  it('stops at the first exact-signature match without evaluating older setups', () => {
    const registry = new SetupRegistry();
    const older = new FakeSetup({ method: 'add/2', expectation: 'older' });
    const newer = new FakeSetup({ method: 'add/2', expectation: 'newer' });
    registry.add(older);
    registry.add(newer);

    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));

    expect(idOf(match)).toBe(1);
    expect(newer.matchCalls).toBe(1);
    expect(older.matchCalls).toBe(0);
  });

  it('lets an older exact-signature setup displace a newer inexact candidate', () => {
    const registry = new SetupRegistry();
    // Older setup declared against the exact signature that is called.
    registry.add(new FakeSetup({ method: 'add/2' }));
    // Newer setup declared against a broader signature that also matches.
    registry.add(new FakeSetup({ method: 'add', matches: (c) => c.method.startsWith('add/') }));

    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));
    expect(idOf(match)).toBe(0);
  });

  it('keeps the inexact candidate when no older setup has the exact signature', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add', matches: () => true, expectation: 'old-broad' }));
    registry.add(new FakeSetup({ method: 'add', matches: () => true, expectation: 'new-broad' }));

    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));
    expect(idOf(match)).toBe(1);
  });

  it('skips the predicate of older setups with another signature once a candidate exists', () => {
    const registry = new SetupRegistry();
    const otherSignature = new FakeSetup({ method: 'add/3', matches: () => true });
    registry.add(otherSignature);
    registry.add(new FakeSetup({ method: 'add', matches: () => true }));

    registry.findMatchFor(new RecordedCall('add/2', [1, 2]));
    expect(otherSignature.matchCalls).toBe(0);
  });
});

describe('registry: findMatchFor(): empty registry', () => {
  it('returns NOT_REGISTERED', () => {
    const registry = new SetupRegistry();
    expect(registry.findMatchFor(new RecordedCall('add/2', [1, 2]))).toBe(NOT_REGISTERED);
  });

  it('leaves the registry and the call untouched', () => {
    const registry = new SetupRegistry();
    const call = new RecordedCall('add/2', [1, 2]);

    registry.findMatchFor(call);

    expect(registry.count).toBe(0);
    expect(call.isVerified).toBe(false);
    expect(registry.add(new FakeSetup({ method: 'add/2' })).id).toBe(0);
  });
});

describe('registry: findMatchFor(): overridden setups', () => {
  it('skips setups flagged as overridden by toArrayLive()', () => {
    const registry = new SetupRegistry();
    const older = new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' });
    registry.add(older);
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)', matches: () => false }));

    registry.toArrayLive(() => true);
    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));

    expect(match).toBe(NOT_REGISTERED);
    expect(older.matchCalls).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// toArrayLive
// ---------------------------------------------------------------------------

describe('registry: toArrayLive(): override detection', () => {
  it('keeps only the newest of two setups sharing an expectation', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' }));

    expect(registry.toArrayLive(() => true).map((r) => r.id)).toEqual([1]);
  });

  it('is stable across repeated calls', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' }));

    const first = registry.toArrayLive(() => true).map((r) => r.id);
    const second = registry.toArrayLive(() => true).map((r) => r.id);
    expect(first).toEqual([1]);
    expect(second).toEqual([1]);
  });

  it('returns live setups newest first', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'a/0' }));
    registry.add(new FakeSetup({ method: 'b/0' }));
    registry.add(new FakeSetup({ method: 'c/0' }));

    expect(registry.toArrayLive(() => true).map((r) => r.id)).toEqual([2, 1, 0]);
  });

  it('applies the predicate to live setups only', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'a/0', expectation: 'same' }));
    registry.add(new FakeSetup({ method: 'b/0', expectation: 'same' }));
    registry.add(new FakeSetup({ method: 'c/0' }));

    const live = registry.toArrayLive((s) => s.method !== 'c/0');
    expect(live.map((r) => r.id)).toEqual([1]);
  });

  it('does not let an overridden setup hide behind a newer one the predicate rejects', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'a/0', expectation: 'same' }));
    registry.add(new FakeSetup({ method: 'b/0', expectation: 'same' }));

    // The newest setup is rejected by the predicate but still shadows the older one.
    expect(registry.toArrayLive((s) => s.method === 'a/0')).toEqual([]);
  });

  it('detects overrides beyond the 32nd setup', () => {
    const registry = new SetupRegistry();
    for (let i = 0; i < 40; i++) {
      registry.add(new FakeSetup({ method: `m${i}/0` }));
    }
    // Duplicate of setup #35 registered last.
    registry.add(new FakeSetup({ method: 'm35/0' }));

    const live = registry.toArrayLive(() => true).map((r) => r.id);
    expect(live).toHaveLength(40);
    expect(live).not.toContain(35);
    expect(live[0]).toBe(40);
    expect(idOf(registry.findMatchFor(new RecordedCall('m35/0')))).toBe(40);
  });
});

describe('registry: toArrayLive(): guarded setups', () => {
  it('lists a guarded duplicate alongside the unguarded setup it shares an expectation with', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)', condition: ALWAYS }));

    expect(registry.toArrayLive(() => true).map((r) => r.id)).toEqual([1, 0]);
  });

  it('does not let a newer unguarded setup shadow an older guarded one', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)', condition: ALWAYS }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' }));

    expect(registry.toArrayLive(() => true).map((r) => r.id)).toEqual([1, 0]);
  });

  it('lists every guarded setup sharing an expectation', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)', condition: ALWAYS }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)', condition: ALWAYS }));

    expect(registry.toArrayLive(() => true).map((r) => r.id)).toEqual([1, 0]);
  });

  it('leaves the older unguarded setup dispatchable', () => {
    const registry = new SetupRegistry();
    const older = new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)' });
    registry.add(older);
    registry.add(
      new FakeSetup({ method: 'add/2', expectation: 'add(1, 2)', condition: ALWAYS, matches: () => false }),
    );

    registry.toArrayLive(() => true);
    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));

    expect(idOf(match)).toBe(0);
    expect(older.matchCalls).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// getInnerMockSetups / any / clear
// ---------------------------------------------------------------------------

describe('registry: getInnerMockSetups()', () => {
  it('returns live setups that produce a nested mock', () => {
    const registry = new SetupRegistry();
    const child = new MockState('child');
    registry.add(new FakeSetup({ method: 'plain/0' }));
    registry.add(new FakeSetup({ method: 'child/0', kind: SetupKind.InnerMock, innerMock: child }));

    const inner = registry.getInnerMockSetups();
    expect(inner.map((r) => r.id)).toEqual([1]);
    expect(inner[0]?.setup.returnsInnerMock()).toBe(child);
  });
});

describe('registry: any()', () => {
  it('sees overridden setups too', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'same', kind: SetupKind.InnerMock }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'same' }));
    registry.toArrayLive(() => true);

    expect(registry.any((s) => s.kind === SetupKind.InnerMock)).toBe(true);
    expect(registry.any((s) => s.method === 'sub/2')).toBe(false);
  });
});

describe('registry: clear()', () => {
  it('drops setups and override marks', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'same' }));
    registry.add(new FakeSetup({ method: 'add/2', expectation: 'same' }));
    registry.toArrayLive(() => true);

    registry.clear();

    expect(registry.count).toBe(0);
    expect(registry.findMatchFor(new RecordedCall('add/2', [1, 2]))).toBe(NOT_REGISTERED);

    // Position 0 is no longer flagged: a fresh setup there is dispatchable.
    registry.add(new FakeSetup({ method: 'add/2' }));
    expect(idOf(registry.findMatchFor(new RecordedCall('add/2', [1, 2])))).toBe(2);
  });

  it('does not disturb a scan in progress', () => {
    const registry = new SetupRegistry();
    registry.add(new FakeSetup({ method: 'add/2' }));
    // The newest setup clears the registry from inside its predicate and declines.
    registry.add(
      new FakeSetup({
        method: 'add',
        matches: () => {
          registry.clear();
          return false;
        },
      }),
    );

    const match = registry.findMatchFor(new RecordedCall('add/2', [1, 2]));
    expect(idOf(match)).toBe(0);
    expect(registry.count).toBe(0);
  });
});
