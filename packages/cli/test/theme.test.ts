/**
 * Mockwork CLI — Output Theme Tests
 *
 * THM-1: result, failure and warning lines get their colours
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { createPalette, paintLine } from '../src/output/theme.js';

const p = createPalette(new Chalk({ level: 3 }));

describe('paintLine()', () => {
  it('THM-1: colours lines by what they report', () => {
    expect(paintLine('Result: PASSED', p)).toBe(p.green.bold('Result: PASSED'));
    expect(paintLine('Result: FAILED', p)).toBe(p.red.bold('Result: FAILED'));
    expect(paintLine('#3 verifyAll repo → FAILED', p)).toBe(p.red('#3 verifyAll repo → FAILED'));
    expect(paintLine('    - repo: call #0 to find/1 was not verified', p)).toBe(
      p.red('    - repo: call #0 to find/1 was not verified'),
    );
    expect(paintLine('#1 call svc.ping/0 → rejected: no setup', p)).toBe(
      p.amber('#1 call svc.ping/0 → rejected: no setup'),
    );
    expect(paintLine('warning: ignored a partial trailing line', p)).toBe(
      p.amber('warning: ignored a partial trailing line'),
    );
    expect(paintLine('#6 reset repo', p)).toBe(p.text('#6 reset repo'));
  });

  it('THM-1: a colourless palette leaves text unchanged', () => {
    const plain = createPalette(new Chalk({ level: 0 }));
    expect(paintLine('Result: FAILED', plain)).toBe('Result: FAILED');
  });
});
