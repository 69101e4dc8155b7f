/**
 * Mockwork CLI — Scenario Validator
 *
 * Validates parsed scenario JSON and rebuilds it as a typed Scenario.
 * Every problem found is reported, each with the path of the offending
 * value (e.g. `steps[3].times`); nothing is thrown.
 *
 * Cross-references are checked too: steps and innerMock fields must name
 * a declared mock, and argument lists must agree with the declared arity.
 */

import { MockBehavior, NESTED_MOCK_KINDS, SetupKind } from '@mockwork/kernel';
import type { ValidationError, ValidationResult } from '@mockwork/kernel';
import type {
  Scenario,
  ScenarioMock,
  ScenarioSetupSpec,
  ScenarioStep,
  TimesSpec,
} from './types.js';

const METHOD_NAME = /^[A-Za-z_$][\w$.]*$/;
const SIGNATURE = /^([A-Za-z_$][\w$.]*)\/(\d+)$/;
const SETUP_KINDS: ReadonlyArray<SetupKind> = Object.values(SetupKind);

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSetupKind(value: unknown): value is SetupKind {
  return SETUP_KINDS.some((kind) => kind === value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/** Arity of a `name/arity` signature, or undefined for a bare name. */
function arityOf(method: string): number | undefined {
  const match = SIGNATURE.exec(method);
  return match?.[2] === undefined ? undefined : Number(match[2]);
}

// ---------------------------------------------------------------------------
// Validator
// ---------------------------------------------------------------------------

class ScenarioValidator {
  readonly errors: ValidationError[] = [];
  private mockNames: ReadonlySet<string> = new Set();

  fail(context: string, message: string): undefined {
    this.errors.push({ message, context });
    return undefined;
  }

  scenario(input: unknown): Scenario | undefined {
    if (!isRecord(input)) {
      return this.fail('$', 'Scenario must be a JSON object');
    }

    const name = input['name'];
    if (name !== undefined && typeof name !== 'string') {
      this.fail('name', 'must be a string');
    }

    const rawMocks = input['mocks'];
    if (!Array.isArray(rawMocks)) {
      this.fail('mocks', 'must be an array');
      return undefined;
    }
    this.mockNames = this.collectMockNames(rawMocks);
    const mocks = rawMocks.map((m: unknown, i) => this.mock(m, `mocks[${i}]`));

    const rawSteps = input['steps'] ?? [];
    if (!Array.isArray(rawSteps)) {
      this.fail('steps', 'must be an array');
      return undefined;
    }
    const steps = rawSteps.map((s: unknown, i) => this.step(s, `steps[${i}]`));

    if (this.errors.length > 0) return undefined;
    return {
      name: typeof name === 'string' ? name : undefined,
      mocks: mocks.filter((m): m is ScenarioMock => m !== undefined),
      steps: steps.filter((s): s is ScenarioStep => s !== undefined),
    };
  }

  private collectMockNames(rawMocks: ReadonlyArray<unknown>): ReadonlySet<string> {
    const names = new Set<string>();
    rawMocks.forEach((m, i) => {
      const name = isRecord(m) ? m['name'] : undefined;
      if (typeof name !== 'string' || name === '') return;
      if (names.has(name)) {
        this.fail(`mocks[${i}].name`, `duplicate mock name "${name}"`);
      }
      names.add(name);
    });
    return names;
  }

  private mockRef(value: unknown, context: string): string | undefined {
    if (typeof value !== 'string' || !this.mockNames.has(value)) {
      return this.fail(context, `must name a declared mock, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  private mock(value: unknown, context: string): ScenarioMock | undefined {
    if (!isRecord(value)) {
      return this.fail(context, 'must be an object');
    }
    const name = value['name'];
    if (typeof name !== 'string' || name === '') {
      this.fail(`${context}.name`, 'must be a non-empty string');
    }

    const behavior = value['behavior'];
    if (
      behavior !== undefined &&
      behavior !== MockBehavior.Loose &&
      behavior !== MockBehavior.Strict
    ) {
      this.fail(`${context}.behavior`, 'must be "Loose" or "Strict"');
    }

    const rawSetups = value['setups'] ?? [];
    if (!Array.isArray(rawSetups)) {
      this.fail(`${context}.setups`, 'must be an array');
      return undefined;
    }
    const setups = rawSetups.map((s: unknown, i) => this.setup(s, `${context}.setups[${i}]`));

    if (typeof name !== 'string') return undefined;
    return {
      name,
      behavior:
        behavior === MockBehavior.Loose || behavior === MockBehavior.Strict ? behavior : undefined,
      setups: setups.filter((s): s is ScenarioSetupSpec => s !== undefined),
    };
  }

  private setup(value: unknown, context: string): ScenarioSetupSpec | undefined {
    if (!isRecord(value)) {
      return this.fail(context, 'must be an object');
    }
    const before = this.errors.length;

    const method = value['method'];
    let arity: number | undefined;
    if (typeof method !== 'string' || !(METHOD_NAME.test(method) || SIGNATURE.test(method))) {
      this.fail(`${context}.method`, 'must be "name" or "name/arity"');
    } else {
      arity = arityOf(method);
    }

    const args = value['args'];
    if (typeof method === 'string' && arity === undefined && args !== undefined) {
      this.fail(`${context}.args`, 'not allowed on a setup declared by name only');
    }
    if (arity !== undefined && !(Array.isArray(args) && args.length === arity)) {
      this.fail(`${context}.args`, `must be an array of ${arity} argument matcher(s)`);
    }

    const throws = value['throws'];
    if (throws !== undefined && typeof throws !== 'string') {
      this.fail(`${context}.throws`, 'must be a string');
    }
    const guard = value['guard'];
    if (guard !== undefined && typeof guard !== 'boolean') {
      this.fail(`${context}.guard`, 'must be a boolean');
    }
    const kind = value['kind'];
    if (kind !== undefined && !isSetupKind(kind)) {
      this.fail(`${context}.kind`, `must be one of ${SETUP_KINDS.join(', ')}`);
    }
    const innerMock = value['innerMock'];
    if (innerMock !== undefined) {
      this.mockRef(innerMock, `${context}.innerMock`);
      if (isSetupKind(kind) && !NESTED_MOCK_KINDS.has(kind)) {
        this.fail(`${context}.kind`, `${kind} setups cannot hand out a mock`);
      }
    }

    if (this.errors.length > before || typeof method !== 'string') return undefined;
    return {
      method,
      args: Array.isArray(args) ? args : undefined,
      returns: value['returns'],
      throws: typeof throws === 'string' ? throws : undefined,
      guard: typeof guard === 'boolean' ? guard : undefined,
      kind: isSetupKind(kind) ? kind : undefined,
      innerMock: typeof innerMock === 'string' ? innerMock : undefined,
    };
  }

  private step(value: unknown, context: string): ScenarioStep | undefined {
    if (!isRecord(value)) {
      return this.fail(context, 'must be an object');
    }
    const type = value['type'];
    const mock = this.mockRef(value['mock'], `${context}.mock`);

    switch (type) {
      case 'call': {
        const method = value['method'];
        if (typeof method !== 'string' || !METHOD_NAME.test(method)) {
          return this.fail(`${context}.method`, 'must be a method name without arity');
        }
        const args = value['args'] ?? [];
        if (!Array.isArray(args)) {
          return this.fail(`${context}.args`, 'must be an array');
        }
        return mock === undefined ? undefined : { type, mock, method, args };
      }
      case 'setup': {
        const spec = this.setup(value, context);
        return mock === undefined || spec === undefined ? undefined : { type, mock, ...spec };
      }
      case 'reset':
        return mock === undefined ? undefined : { type, mock };
      case 'verifyNoOtherCalls':
        return mock === undefined ? undefined : { type, mock };
      case 'verifyAll': {
        const dontVerify = value['dontVerify'];
        if (
          dontVerify !== undefined &&
          !(Array.isArray(dontVerify) && dontVerify.every((d) => typeof d === 'string'))
        ) {
          return this.fail(`${context}.dontVerify`, 'must be an array of setup methods');
        }
        const skipped = Array.isArray(dontVerify) ? dontVerify.filter(isString) : undefined;
        return mock === undefined ? undefined : { type, mock, dontVerify: skipped };
      }
      case 'verifyCalls': {
        const method = value['method'];
        const arity = typeof method === 'string' ? arityOf(method) : undefined;
        if (typeof method !== 'string' || arity === undefined) {
          return this.fail(`${context}.method`, 'must be "name/arity"');
        }
        const args = value['args'];
        if (args !== undefined && !(Array.isArray(args) && args.length === arity)) {
          return this.fail(`${context}.args`, `must be an array of ${arity} argument matcher(s)`);
        }
        const times = this.times(value['times'], `${context}.times`);
        if (mock === undefined || times === undefined) return undefined;
        return { type, mock, method, args: Array.isArray(args) ? args : undefined, times };
      }
      default:
        return this.fail(
          `${context}.type`,
          'must be one of call, setup, reset, verifyAll, verifyCalls, verifyNoOtherCalls',
        );
    }
  }

  private times(value: unknown, context: string): TimesSpec | undefined {
    if (value === 'never' || value === 'once') return value;
    if (isRecord(value)) {
      const keys = Object.keys(value);
      const { exactly, atLeast, atMost, between } = value;
      if (keys.length === 1) {
        if (isCount(exactly)) return { exactly };
        if (isCount(atLeast)) return { atLeast };
        if (isCount(atMost)) return { atMost };
        if (Array.isArray(between) && between.length === 2) {
          const [min, max]: ReadonlyArray<unknown> = between;
          if (isCount(min) && isCount(max) && min <= max) return { between: [min, max] };
        }
      }
    }
    return this.fail(
      context,
      'must be "never", "once", or one of { exactly | atLeast | atMost: n }, { between: [min, max] }',
    );
  }
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Validate parsed scenario JSON.
 *
 * @returns The typed scenario, or every validation error found
 */
export function validateScenario(input: unknown): ValidationResult<Scenario> {
  const validator = new ScenarioValidator();
  const scenario = validator.scenario(input);
  if (scenario === undefined) {
    return { ok: false, errors: validator.errors };
  }
  return { ok: true, value: scenario };
}
