/**
 * Mockwork CLI — Scenario Validator Tests
 *
 * SCN-1: well-formed scenarios come back as typed values
 * SCN-2: every problem is reported with the path of the offending value
 * SCN-3: cross-references (mock names, arity, nested kinds) are checked
 * SCN-4: call count ranges are validated
 */

import { describe, it, expect } from 'vitest';
import { validateScenario } from '../src/scenario/validator.js';

function errorsOf(input: unknown): Array<{ message: string; context?: string | undefined }> {
  const result = validateScenario(input);
  return result.ok ? [] : [...result.errors];
}

describe('validateScenario()', () => {
  it('SCN-1: returns the typed scenario', () => {
    const result = validateScenario({
      name: 'lookup',
      mocks: [
        {
          name: 'repo',
          behavior: 'Strict',
          setups: [
            { method: 'find/1', args: [1], returns: 42 },
            { method: 'find', guard: true },
          ],
        },
      ],
      steps: [
        { type: 'call', mock: 'repo', method: 'find', args: [1] },
        { type: 'setup', mock: 'repo', method: 'save/1', args: [{ $any: true }], throws: 'read-only' },
        { type: 'reset', mock: 'repo' },
        { type: 'verifyAll', mock: 'repo', dontVerify: ['find'] },
        { type: 'verifyCalls', mock: 'repo', method: 'find/1', times: { atLeast: 1 } },
        { type: 'verifyNoOtherCalls', mock: 'repo' },
      ],
    });

    expect(result).toEqual({
      ok: true,
      value: {
        name: 'lookup',
        mocks: [
          {
            name: 'repo',
            behavior: 'Strict',
            setups: [
              { method: 'find/1', args: [1], returns: 42 },
              { method: 'find', guard: true },
            ],
          },
        ],
        steps: [
          { type: 'call', mock: 'repo', method: 'find', args: [1] },
          {
            type: 'setup',
            mock: 'repo',
            method: 'save/1',
            args: [{ $any: true }],
            throws: 'read-only',
          },
          { type: 'reset', mock: 'repo' },
          { type: 'verifyAll', mock: 'repo', dontVerify: ['find'] },
          { type: 'verifyCalls', mock: 'repo', method: 'find/1', times: { atLeast: 1 } },
          { type: 'verifyNoOtherCalls', mock: 'repo' },
        ],
      },
    });
  });

  it('SCN-1: call args and steps default to empty', () => {
    const result = validateScenario({
      mocks: [{ name: 'clock' }],
      steps: [{ type: 'call', mock: 'clock', method: 'now' }],
    });
    expect(result).toEqual({
      ok: true,
      value: {
        mocks: [{ name: 'clock', setups: [] }],
        steps: [{ type: 'call', mock: 'clock', method: 'now', args: [] }],
      },
    });
    expect(validateScenario({ mocks: [] })).toEqual({ ok: true, value: { mocks: [], steps: [] } });
  });

  it('SCN-2: rejects a non-object document', () => {
    expect(errorsOf(42)).toEqual([{ message: 'Scenario must be a JSON object', context: '$' }]);
    expect(errorsOf([])).toEqual([{ message: 'Scenario must be a JSON object', context: '$' }]);
    expect(errorsOf({})).toEqual([{ message: 'must be an array', context: 'mocks' }]);
  });

  it('SCN-2: reports every problem with its path', () => {
    expect(
      errorsOf({
        mocks: [
          {
            name: 'repo',
            setups: [
              { method: 'find/2', args: [1] },
              { method: 'find', args: [1] },
            ],
          },
        ],
        steps: [
          { type: 'call', mock: 'nope', method: 'find' },
          { type: 'verifyCalls', mock: 'repo', method: 'find', times: 'once' },
          { type: 'bogus', mock: 'repo' },
        ],
      }),
    ).toEqual([
      { context: 'mocks[0].setups[0].args', message: 'must be an array of 2 argument matcher(s)' },
      { context: 'mocks[0].setups[1].args', message: 'not allowed on a setup declared by name only' },
      { context: 'steps[0].mock', message: 'must name a declared mock, got "nope"' },
      { context: 'steps[1].method', message: 'must be "name/arity"' },
      {
        context: 'steps[2].type',
        message: 'must be one of call, setup, reset, verifyAll, verifyCalls, verifyNoOtherCalls',
      },
    ]);
  });

  it('SCN-2: call steps take a bare method name', () => {
    expect(
      errorsOf({
        mocks: [{ name: 'repo', setups: [] }],
        steps: [{ type: 'call', mock: 'repo', method: 'find/1', args: [1] }],
      }),
    ).toEqual([{ context: 'steps[0].method', message: 'must be a method name without arity' }]);
  });

  it('SCN-3: rejects duplicate mock names', () => {
    expect(
      errorsOf({ mocks: [{ name: 'a', setups: [] }, { name: 'a', setups: [] }], steps: [] }),
    ).toEqual([{ context: 'mocks[1].name', message: 'duplicate mock name "a"' }]);
  });

  it('SCN-3: innerMock must name a declared mock and needs a nested kind', () => {
    expect(
      errorsOf({
        mocks: [
          {
            name: 'factory',
            setups: [
              { method: 'create/0', args: [], innerMock: 'missing' },
              { method: 'make/0', args: [], innerMock: 'widget', kind: 'Method' },
            ],
          },
          { name: 'widget', setups: [] },
        ],
      }),
    ).toEqual([
      { context: 'mocks[0].setups[0].innerMock', message: 'must name a declared mock, got "missing"' },
      { context: 'mocks[0].setups[1].kind', message: 'Method setups cannot hand out a mock' },
    ]);
  });

  it('SCN-3: rejects unknown kinds and behaviors', () => {
    expect(
      errorsOf({
        mocks: [{ name: 'repo', behavior: 'Lenient', setups: [{ method: 'get', kind: 'Field' }] }],
      }),
    ).toEqual([
      { context: 'mocks[0].behavior', message: 'must be "Loose" or "Strict"' },
      {
        context: 'mocks[0].setups[0].kind',
        message: 'must be one of Method, InnerMock, AutoPropertyGetter, AutoPropertySetter',
      },
    ]);
  });

  it('SCN-4: accepts every call count form', () => {
    const forms = ['never', 'once', { exactly: 2 }, { atLeast: 0 }, { atMost: 3 }, { between: [1, 4] }];
    for (const times of forms) {
      const result = validateScenario({
        mocks: [{ name: 'repo', setups: [] }],
        steps: [{ type: 'verifyCalls', mock: 'repo', method: 'find/0', times }],
      });
      expect(result.ok).toBe(true);
    }
  });

  it('SCN-4: rejects malformed call counts', () => {
    const bad = ['twice', { between: [3, 1] }, { exactly: -1 }, { exactly: 1, atMost: 2 }, undefined];
    for (const times of bad) {
      expect(
        errorsOf({
          mocks: [{ name: 'repo', setups: [] }],
          steps: [{ type: 'verifyCalls', mock: 'repo', method: 'find/0', times }],
        }),
      ).toEqual([
        {
          context: 'steps[0].times',
          message:
            'must be "never", "once", or one of { exactly | atLeast | atMost: n }, { between: [min, max] }',
        },
      ]);
    }
  });
});
