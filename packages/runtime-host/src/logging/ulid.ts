/**
 * Mockwork Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier, used as the
 * `event_id` of every line in the dispatch log so that logs merged from
 * several runs can be deduplicated on read.
 *
 * ULID format: 26 characters, Crockford Base32 encoded.
 *   - 10 chars: 48-bit millisecond timestamp
 *   - 16 chars: 80-bit random component
 *
 * Ids from one factory are strictly increasing: within a millisecond (or
 * when the clock steps backwards) the previous random component is
 * incremented instead of drawing a new one. A replay dispatches many calls
 * per millisecond, and the log reader breaks timestamp ties by event_id.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

// ---------------------------------------------------------------------------
// Crockford Base32 Encoding
// ---------------------------------------------------------------------------

/** Crockford's Base32 alphabet (no I, L, O, U). */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;

const MAX_TIME = (1n << 48n) - 1n;
const MAX_RANDOM = (1n << 80n) - 1n;

/** Encode `value` as exactly `length` Base32 characters, zero-padded. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 0x1fn)) + out;
    v >>= 5n;
  }
  return out;
}

function randomComponent(): bigint {
  let value = 0n;
  for (const byte of randomBytes(RANDOM_BYTES)) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface UlidSources {
  /** Milliseconds since the epoch. Defaults to Date.now. */
  readonly now?: (() => number) | undefined;
  /** 80-bit random value. Defaults to node:crypto randomness. */
  readonly random?: (() => bigint) | undefined;
}

/** Produces ULIDs that sort in generation order. */
export type UlidFactory = () => string;

/**
 * Create a ULID factory.
 *
 * @throws {RangeError} From the returned factory, if the timestamp is
 *   outside 48 bits or the random component overflows within one
 *   millisecond
 */
export function createUlidFactory(sources: UlidSources = {}): UlidFactory {
  const now = sources.now ?? Date.now;
  const random = sources.random ?? randomComponent;
  let lastTime = -1n;
  let lastRandom = 0n;

  return () => {
    let time = BigInt(now());
    if (time < 0n || time > MAX_TIME) {
      throw new RangeError(`ULID timestamp out of range: ${time}`);
    }

    if (time <= lastTime) {
      time = lastTime;
      if (lastRandom === MAX_RANDOM) {
        throw new RangeError('ULID random component overflowed within one millisecond');
      }
      lastRandom += 1n;
    } else {
      lastTime = time;
      lastRandom = random() & MAX_RANDOM;
    }

    return encodeCrockford(time, TIME_CHARS) + encodeCrockford(lastRandom, RANDOM_CHARS);
  };
}

/**
 * Generate a ULID from the process-wide factory.
 *
 * @example
 * const id = ulid();
 * // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export const ulid: UlidFactory = createUlidFactory();
