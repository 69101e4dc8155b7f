/**
 * @mockwork/cli
 *
 * Scenario replay and dispatch log queries over the Mockwork kernel. The
 * `mockwork` executable lives in bin/mockwork.ts; this module exports the
 * pieces it is built from.
 */

export { program } from './commands/index.js';
export type { CommandResult, ReplayOptions } from './commands/replay.js';
export { runReplay } from './commands/replay.js';
export type { LogQueryOptions } from './commands/log.js';
export { runLogQuery } from './commands/log.js';

export type {
  AnyArgument,
  Scenario,
  ScenarioMock,
  ScenarioSetupSpec,
  ScenarioStep,
  TimesSpec,
} from './scenario/types.js';
export { validateScenario } from './scenario/validator.js';
export { ScenarioSetup, argumentsMatch } from './scenario/scenario-setup.js';
export type { RunOptions, ScenarioReport, StepReport } from './scenario/runner.js';
export { runScenario, toTimes } from './scenario/runner.js';
export { formatReport } from './scenario/report.js';
