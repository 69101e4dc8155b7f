/**
 * Mockwork CLI — Scenario Report Formatting
 *
 * Renders a ScenarioReport as the human-readable lines printed by
 * `mockwork replay`. One line per step, verification failures indented
 * beneath their step, and a closing `Result:` line.
 */

import type { ScenarioReport, StepReport } from './runner.js';

/** Display form of a returned value. */
export function formatValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

export function formatStep(step: StepReport): string[] {
  const prefix = `#${step.step}`;
  switch (step.type) {
    case 'call': {
      const head = `${prefix} call ${step.mock}.${step.method} →`;
      if (step.outcome === 'rejected') {
        return [`${head} rejected: ${step.error ?? ''}`];
      }
      if (step.outcome === 'unmatched') {
        return [`${head} unmatched, returned ${formatValue(step.returned)}`];
      }
      const governed = `${head} matched setup #${step.setupId} (v${step.version ?? '?'})`;
      return step.error !== undefined
        ? [`${governed} threw ${JSON.stringify(step.error)}`]
        : [`${governed} returned ${formatValue(step.returned)}`];
    }
    case 'setup':
      return [`${prefix} setup ${step.mock}.${step.method} → setup #${step.setupId}`];
    case 'reset':
      return [`${prefix} reset ${step.mock}`];
    case 'verification':
      return [
        `${prefix} ${step.operation} ${step.mock} → ${step.passed ? 'passed' : 'FAILED'}`,
        ...step.failures.map((f) => `    - ${f}`),
      ];
  }
}

export function formatReport(report: ScenarioReport): string[] {
  const lines: string[] = [];
  if (report.name !== undefined) {
    lines.push(`Scenario: ${report.name}`);
  }
  for (const step of report.steps) {
    lines.push(...formatStep(step));
  }
  lines.push(`Result: ${report.passed ? 'PASSED' : 'FAILED'}`);
  return lines;
}
