/**
 * Mockwork Runtime Host — Configuration
 *
 * Reads `<MOCKWORK_HOME>/config.json`:
 *
 *   {
 *     "defaultBehavior": "Loose" | "Strict",   // behavior of mocks that do not set one
 *     "logFile": "dispatch.jsonl"              // file name under <home>/logs/
 *   }
 *
 * Both keys are optional. A missing file yields the defaults. A file that
 * is not valid JSON, or holds invalid values, yields validation errors;
 * the caller decides whether to abort.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { MockBehavior } from '@mockwork/kernel';
import type { ValidationError, ValidationResult } from '@mockwork/kernel';
import { DEFAULT_LOG_FILE } from './logging/file-log-sink.js';
import { isNodeError } from './state/log-store.js';

export const CONFIG_FILE = 'config.json';

export interface MockworkConfig {
  readonly defaultBehavior: MockBehavior;
  readonly logFile: string;
}

export const DEFAULT_CONFIG: MockworkConfig = {
  defaultBehavior: MockBehavior.Loose,
  logFile: DEFAULT_LOG_FILE,
};

/**
 * Load the configuration stored under `home`.
 *
 * @throws Rethrows I/O errors other than ENOENT
 */
export function loadConfig(home: string): ValidationResult<MockworkConfig> {
  const path = join(home, CONFIG_FILE);
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return { ok: true, value: DEFAULT_CONFIG };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [{ message: `Invalid JSON: ${detail}`, context: path }] };
  }

  return validateConfig(parsed, path);
}

/**
 * Validate a parsed config object, filling in defaults for absent keys.
 */
export function validateConfig(value: unknown, context = CONFIG_FILE): ValidationResult<MockworkConfig> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { ok: false, errors: [{ message: 'Config must be a JSON object', context }] };
  }

  const errors: ValidationError[] = [];
  let defaultBehavior = DEFAULT_CONFIG.defaultBehavior;
  let logFile = DEFAULT_CONFIG.logFile;

  if ('defaultBehavior' in value && value.defaultBehavior !== undefined) {
    const behavior = value.defaultBehavior;
    if (behavior === MockBehavior.Loose || behavior === MockBehavior.Strict) {
      defaultBehavior = behavior;
    } else {
      errors.push({
        message: `defaultBehavior must be "Loose" or "Strict", got ${JSON.stringify(behavior)}`,
        context,
      });
    }
  }

  if ('logFile' in value && value.logFile !== undefined) {
    const file = value.logFile;
    if (typeof file === 'string' && /^[\w.-]+$/.test(file) && file !== '.' && file !== '..') {
      logFile = file;
    } else {
      errors.push({
        message: `logFile must be a plain file name, got ${JSON.stringify(file)}`,
        context,
      });
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: { defaultBehavior, logFile } };
}
