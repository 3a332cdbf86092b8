import type { LineSink } from '../io/line-io.js';
import type { StateReceiver } from '../types/participant.js';

/**
 * Observer participant that remembers every hour it was told and, when
 * given a sink, writes `"<name> <hour>"` for each one.
 *
 * @example
 * ```typescript
 * const amy = new RecordingObserver('Amy', sink);
 * clock.register(amy);
 * clock.advance();   // sink receives "Amy 1"
 * amy.received;      // [1]
 * ```
 */
export class RecordingObserver implements StateReceiver {
  readonly name: string;
  private readonly hours: number[] = [];

  constructor(
    name: string,
    private readonly sink?: LineSink
  ) {
    this.name = name;
  }

  receivesState(hour: number): void {
    this.hours.push(hour);
    this.sink?.writeLine(`${this.name} ${hour}`);
  }

  get received(): readonly number[] {
    return this.hours;
  }

  /** Most recent hour, or undefined before the first notification */
  get lastHour(): number | undefined {
    return this.hours.at(-1);
  }
}
