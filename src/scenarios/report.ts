import type { ErrorPolicy } from '../config/index.js';
import type { LineSink } from '../io/line-io.js';
import { createLogger } from '../logging/index.js';
import { ErrorCode } from '../types/error-type.js';
import { DispatchError } from '../types/errors.js';
import type { ScenarioOutcome } from './types.js';

const log = createLogger({ component: 'scenario' });

export const INVALID_INPUT = 'Invalid input';
export const UNKNOWN_STRATEGY_TYPE = 'Unknown strategy type';

/**
 * Line written to the sink when a scenario reports an error.
 */
export function messageFor(error: DispatchError): string {
  return error.code === ErrorCode.UNKNOWN_STRATEGY ? UNKNOWN_STRATEGY_TYPE : INVALID_INPUT;
}

/**
 * Process exit status for an outcome: unknown strategies stop the batch
 * but are not input errors.
 */
export function exitCodeFor(outcome: ScenarioOutcome): number {
  if (outcome.status === 'completed' || outcome.error.code === ErrorCode.UNKNOWN_STRATEGY) {
    return 0;
  }
  return 1;
}

/**
 * Tracks lines skipped under the 'skip' error policy.
 */
export class LineErrorHandler {
  private skippedLines = 0;

  constructor(
    private readonly scenario: string,
    private readonly sink: LineSink,
    private readonly policy: ErrorPolicy
  ) {}

  /**
   * Deal with an error raised while processing one line.
   *
   * Under 'skip' a {@link DispatchError} is reported and swallowed;
   * anything else, or any error under 'halt', is rethrown for
   * {@link runGuarded} to report.
   */
  onLineError(error: unknown, line: string): void {
    if (this.policy !== 'skip' || !(error instanceof DispatchError)) {
      throw error;
    }
    this.sink.writeLine(messageFor(error));
    this.skippedLines++;
    log.warn('Skipped line', {
      scenario: this.scenario,
      line,
      code: error.code,
      error_message: error.message,
    });
  }

  get skipped(): number {
    return this.skippedLines;
  }
}

/**
 * Run a scenario body, turning a {@link DispatchError} into a halted
 * outcome after writing its message line. Other errors propagate.
 */
export function runGuarded(
  scenario: string,
  sink: LineSink,
  handler: LineErrorHandler,
  body: () => void
): ScenarioOutcome {
  try {
    body();
  } catch (error) {
    if (!(error instanceof DispatchError)) {
      throw error;
    }
    sink.writeLine(messageFor(error));
    log.warn('Scenario halted', {
      scenario,
      code: error.code,
      error_message: error.message,
    });
    return { status: 'halted', error };
  }

  log.debug('Scenario completed', { scenario, skipped: handler.skipped });
  return { status: 'completed', skipped: handler.skipped };
}
