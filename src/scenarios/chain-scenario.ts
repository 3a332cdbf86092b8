/**
 * Chain protocol.
 *
 * Input: `n`, then `n` lines `"<name> <days>"`.
 * Output, per request: `"<name> Approved by <label>."` or
 * `"<name> Denied by <label>."`.
 *
 * An empty `links` option throws `EmptyChainError` before any input
 * is read.
 */

import {
  DEFAULT_LINKS,
  EscalationChain,
  formatOutcome,
  type LinkSpec,
} from '../chain/escalation-chain.js';
import type { LineSink, LineSource } from '../io/line-io.js';
import { parseInteger, TokenReader, tokenize } from '../io/token-reader.js';
import { MalformedInputError } from '../types/errors.js';
import { LineErrorHandler, runGuarded } from './report.js';
import type { ScenarioOptions, ScenarioOutcome } from './types.js';

export interface ChainScenarioOptions extends ScenarioOptions {
  /** Links head first (default: Supervisor 3, Manager 7, Director 10) */
  links?: readonly LinkSpec[];
}

export function runChainScenario(
  source: LineSource,
  sink: LineSink,
  options: ChainScenarioOptions = {}
): ScenarioOutcome {
  const chain = EscalationChain.fromLinks(options.links ?? DEFAULT_LINKS, options.events);
  const reader = new TokenReader(source);
  const handler = new LineErrorHandler('chain', sink, options.errorPolicy ?? 'halt');

  return runGuarded('chain', sink, handler, () => {
    const requestCount = reader.nextCount('request count');
    for (let i = 0; i < requestCount; i++) {
      const line = reader.nextLine();
      if (line === undefined) {
        throw new MalformedInputError(`Expected ${requestCount} requests, input ended after ${i}`);
      }

      try {
        const tokens = tokenize(line);
        if (tokens.length !== 2) {
          throw new MalformedInputError(`Expected "<name> <days>", got '${line}'`, line);
        }
        const [subjectName, daysToken] = tokens;
        const magnitude = parseInteger(daysToken);
        if (magnitude === undefined || magnitude < 0) {
          throw new MalformedInputError(`Days must be a non-negative integer, got '${daysToken}'`, line);
        }
        sink.writeLine(formatOutcome(chain.handle({ subjectName, magnitude })));
      } catch (error) {
        handler.onLineError(error, line);
      }
    }
  });
}
