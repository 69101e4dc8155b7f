/**
 * Mockwork CLI — Canonical JSON
 *
 * JSON with object keys sorted at every level, so structurally equal values
 * produce identical strings regardless of property insertion order. Used
 * for expectation identities and argument comparison.
 */

export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value !== 'object') {
    // bigint, symbol, function: not representable, compared by their text
    return JSON.stringify(String(value));
  }
  const pairs = Object.entries(value)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
  return '{' + pairs.join(',') + '}';
}
