/**
 * Observer protocol.
 *
 * Input: `N`, then `N` participant names, then `U`. The clock advances
 * `U` times; advance triggers after `U` carry no data and are not read.
 *
 * Output, per advance and per participant in registration order:
 * `"<name> <hour>"`.
 */

import type { LineSink, LineSource } from '../io/line-io.js';
import { TokenReader } from '../io/token-reader.js';
import { BroadcastNotifier } from '../observer/broadcast-notifier.js';
import { RecordingObserver } from '../observer/participants.js';
import { LineErrorHandler, runGuarded } from './report.js';
import type { ScenarioOptions, ScenarioOutcome } from './types.js';

export function runObserverScenario(
  source: LineSource,
  sink: LineSink,
  options: ScenarioOptions = {}
): ScenarioOutcome {
  const reader = new TokenReader(source);
  const handler = new LineErrorHandler('observer', sink, options.errorPolicy ?? 'halt');
  const clock = new BroadcastNotifier({
    duplicatePolicy: options.duplicatePolicy,
    events: options.events,
  });

  return runGuarded('observer', sink, handler, () => {
    const participantCount = reader.nextCount('participant count');
    for (let i = 0; i < participantCount; i++) {
      clock.register(new RecordingObserver(reader.requireToken('participant name'), sink));
    }

    const updateCount = reader.nextCount('update count');
    for (let i = 0; i < updateCount; i++) {
      clock.advance();
    }
  });
}
