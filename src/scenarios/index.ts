/**
 * Scenario drivers: the line-oriented protocols that exercise each
 * discipline end to end.
 */

import type { LineSink, LineSource } from '../io/line-io.js';
import { UnknownScenarioError } from '../types/errors.js';
import { runChainScenario } from './chain-scenario.js';
import { runMediatorScenario } from './mediator-scenario.js';
import { runObserverScenario } from './observer-scenario.js';
import { runStrategyScenario } from './strategy-scenario.js';
import type { ScenarioOptions, ScenarioOutcome, ScenarioRunner } from './types.js';

export const SCENARIOS = {
  observer: runObserverScenario,
  strategy: runStrategyScenario,
  mediator: runMediatorScenario,
  chain: runChainScenario,
} as const satisfies Record<string, ScenarioRunner>;

export type ScenarioName = keyof typeof SCENARIOS;

export const SCENARIO_NAMES = Object.keys(SCENARIOS);

export function isScenarioName(name: string): name is ScenarioName {
  return Object.hasOwn(SCENARIOS, name);
}

/**
 * Run a scenario by name.
 *
 * @throws UnknownScenarioError if no driver has that name
 */
export function runScenario(
  name: string,
  source: LineSource,
  sink: LineSink,
  options?: ScenarioOptions
): ScenarioOutcome {
  if (!isScenarioName(name)) {
    throw new UnknownScenarioError(name, SCENARIO_NAMES);
  }
  return SCENARIOS[name](source, sink, options);
}

export { type ChainScenarioOptions, runChainScenario } from './chain-scenario.js';
export { runMediatorScenario } from './mediator-scenario.js';
export { runObserverScenario } from './observer-scenario.js';
export {
  exitCodeFor,
  INVALID_INPUT,
  LineErrorHandler,
  messageFor,
  runGuarded,
  UNKNOWN_STRATEGY_TYPE,
} from './report.js';
export { runStrategyScenario } from './strategy-scenario.js';
export type { ScenarioOptions, ScenarioOutcome, ScenarioRunner } from './types.js';
