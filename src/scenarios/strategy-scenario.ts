/**
 * Strategy protocol.
 *
 * Input: `N`, then `N` lines `"<price> <strategyId>"`.
 * Output: one line per case, the transformed price or
 * `"Unknown strategy type"`.
 */

import type { LineSink, LineSource } from '../io/line-io.js';
import { parseInteger, TokenReader, tokenize } from '../io/token-reader.js';
import { StrategyResolver } from '../strategy/strategy-resolver.js';
import { MalformedInputError } from '../types/errors.js';
import { LineErrorHandler, runGuarded } from './report.js';
import type { ScenarioOptions, ScenarioOutcome } from './types.js';

export function runStrategyScenario(
  source: LineSource,
  sink: LineSink,
  options: ScenarioOptions = {}
): ScenarioOutcome {
  const reader = new TokenReader(source);
  const handler = new LineErrorHandler('strategy', sink, options.errorPolicy ?? 'halt');
  const resolver = new StrategyResolver({ events: options.events });

  return runGuarded('strategy', sink, handler, () => {
    const caseCount = reader.nextCount('case count');
    for (let i = 0; i < caseCount; i++) {
      const line = reader.nextLine();
      if (line === undefined) {
        throw new MalformedInputError(`Expected ${caseCount} cases, input ended after ${i}`);
      }

      try {
        const tokens = tokenize(line);
        if (tokens.length !== 2) {
          throw new MalformedInputError(`Expected "<price> <strategyId>", got '${line}'`, line);
        }
        const [priceToken, identifier] = tokens;
        const price = parseInteger(priceToken);
        if (price === undefined) {
          throw new MalformedInputError(`Price must be an integer, got '${priceToken}'`, line);
        }
        sink.writeLine(String(resolver.resolve(identifier).apply(price)));
      } catch (error) {
        handler.onLineError(error, line);
      }
    }
  });
}
