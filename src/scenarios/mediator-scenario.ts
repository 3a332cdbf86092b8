/**
 * Mediator protocol.
 *
 * Input: `N`, then `N` user names, then `<sender> <message>` token pairs
 * until end of input. Pairs may share a line or span a line break; a
 * sender left without a message at the end of input ends the run.
 * Output, per delivery: `"<receiver> received: <message>"`. Messages from
 * senders that were never registered produce nothing.
 */

import type { LineSink, LineSource } from '../io/line-io.js';
import { TokenReader } from '../io/token-reader.js';
import { MediatedRouter } from '../mediator/mediated-router.js';
import { LineErrorHandler, runGuarded } from './report.js';
import type { ScenarioOptions, ScenarioOutcome } from './types.js';

export function runMediatorScenario(
  source: LineSource,
  sink: LineSink,
  options: ScenarioOptions = {}
): ScenarioOutcome {
  const reader = new TokenReader(source);
  const handler = new LineErrorHandler('mediator', sink, options.errorPolicy ?? 'halt');
  const router = new MediatedRouter({
    sink,
    duplicatePolicy: options.duplicatePolicy,
    events: options.events,
  });

  return runGuarded('mediator', sink, handler, () => {
    const userCount = reader.nextCount('user count');
    for (let i = 0; i < userCount; i++) {
      router.addUser(reader.requireToken('user name'));
    }

    for (;;) {
      const sender = reader.nextToken();
      const body = sender === undefined ? undefined : reader.nextToken();
      if (sender === undefined || body === undefined) {
        return;
      }
      router.sendFrom(sender, body);
    }
  });
}
