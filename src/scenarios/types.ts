/**
 * Scenario driver types.
 */

import type { DuplicatePolicy, ErrorPolicy } from '../config/index.js';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import type { LineSink, LineSource } from '../io/line-io.js';
import type { DispatchError } from '../types/errors.js';

export interface ScenarioOptions {
  /** Halt on the first bad line (default) or report it and carry on */
  errorPolicy?: ErrorPolicy;

  /** Registry policy for repeated participant names (default: 'reject') */
  duplicatePolicy?: DuplicatePolicy;

  /** Bus the scenario's discipline instance publishes on */
  events?: DispatchEventEmitter;
}

/**
 * How a scenario run ended.
 *
 * - completed: all input consumed (lines may have been skipped under 'skip')
 * - halted: stopped at `error`, whose message line has been written
 */
export type ScenarioOutcome =
  | { status: 'completed'; skipped: number }
  | { status: 'halted'; error: DispatchError };

export type ScenarioRunner = (
  source: LineSource,
  sink: LineSink,
  options?: ScenarioOptions
) => ScenarioOutcome;
