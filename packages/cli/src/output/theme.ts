import chalk, { type ChalkInstance } from 'chalk'

export interface Palette {
  readonly blue:  ChalkInstance
  readonly text:  ChalkInstance
  readonly muted: ChalkInstance
  readonly amber: ChalkInstance
  readonly green: ChalkInstance
  readonly red:   ChalkInstance
}

export const createPalette = (c: ChalkInstance): Palette => ({
  blue:  c.hex('#4FC3F7'),
  text:  c.hex('#C8C8C0'),
  muted: c.hex('#666666'),
  amber: c.hex('#D4880A'),
  green: c.hex('#81C784'),
  red:   c.hex('#CF6679'),
})

export const t: Palette = createPalette(chalk)

/**
 * paintLine — colour one line of command output by what it reports.
 * Plain-text output (tests, --json) never goes through here.
 */
export function paintLine(line: string, p: Palette = t): string {
  if (line === 'Result: PASSED') return p.green.bold(line)
  if (line === 'Result: FAILED') return p.red.bold(line)
  if (line.startsWith('Scenario: ')) return p.blue.bold(line)
  if (line.startsWith('warning: ')) return p.amber(line)
  if (line.startsWith('    - ') || line.endsWith('→ FAILED')) return p.red(line)
  if (line.includes('→ rejected') || line.includes('→ unmatched')) return p.amber(line)
  if (line === '(no entries)') return p.muted(line)
  return p.text(line)
}
