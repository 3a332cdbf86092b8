/**
 * Broadcast notification: a clock subject that tells every registered
 * observer the new hour each time it advances.
 */

import type { DuplicatePolicy } from '../config/index.js';
import { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { ParticipantRegistry } from '../registry/participant-registry.js';
import type { StateReceiver } from '../types/participant.js';

const log = createLogger({ component: 'broadcast-notifier' });

export const HOURS_PER_DAY = 24;

export interface BroadcastNotifierOptions {
  duplicatePolicy?: DuplicatePolicy;
  events?: DispatchEventEmitter;
}

/**
 * Subject holding the hour of day in [0, 23].
 *
 * The hour starts at 0 and only moves through {@link advance}.
 */
export class BroadcastNotifier {
  readonly events: DispatchEventEmitter;

  private readonly registry: ParticipantRegistry<StateReceiver>;
  private currentHour = 0;

  constructor(options: BroadcastNotifierOptions = {}) {
    this.events = options.events ?? new DispatchEventEmitter();
    this.registry = new ParticipantRegistry<StateReceiver>({
      discipline: 'broadcast-notify',
      duplicatePolicy: options.duplicatePolicy,
      events: this.events,
    });
  }

  get hour(): number {
    return this.currentHour;
  }

  register(participant: StateReceiver): void {
    this.registry.add(participant);
  }

  /**
   * Remove a participant, given either the participant or its name.
   *
   * @returns True if something was removed
   */
  unregister(participant: StateReceiver | string): boolean {
    const name = typeof participant === 'string' ? participant : participant.name;
    return this.registry.remove(name);
  }

  /**
   * Move the clock forward one hour and notify every participant, in
   * registration order.
   *
   * @returns The new hour
   */
  advance(): number {
    this.currentHour = (this.currentHour + 1) % HOURS_PER_DAY;
    const hour = this.currentHour;

    const recipients: string[] = [];
    this.registry.forEach((participant) => {
      participant.receivesState(hour);
      recipients.push(participant.name);
    });

    log.trace('Broadcast hour', { operation: 'advance', hour, recipients: recipients.length });
    this.events.emitStateBroadcast(hour, recipients);
    return hour;
  }

  participants(): string[] {
    return this.registry.names();
  }

  get participantCount(): number {
    return this.registry.size;
  }
}
