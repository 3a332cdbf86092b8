import type { DuplicatePolicy } from '../config/index.js';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { DuplicateParticipantError, InvalidParticipantNameError } from '../types/errors.js';
import type { Discipline, Participant } from '../types/participant.js';

const log = createLogger({ component: 'participant-registry' });

/**
 * Options for a {@link ParticipantRegistry}.
 */
export interface ParticipantRegistryOptions {
  /** Discipline that owns the registry, reported in logs and events */
  discipline: Discipline;

  /** What to do when a name is added twice (default: 'reject') */
  duplicatePolicy?: DuplicatePolicy;

  /** Bus receiving `participant.registered` / `participant.removed` */
  events?: DispatchEventEmitter;
}

const NAME_PATTERN = /^\S+$/;

/**
 * Ordered collection of named participants.
 *
 * Iteration order is registration order. Under the `replace` duplicate
 * policy a participant that takes over an existing name keeps the slot
 * of the one it replaces.
 *
 * @example
 * ```typescript
 * const registry = new ParticipantRegistry<StateReceiver>({ discipline: 'broadcast-notify' });
 * registry.add(new RecordingObserver('Amy'));
 * registry.add(new RecordingObserver('Bob'));
 *
 * registry.forEach((participant) => participant.receivesState(1));
 * registry.names(); // ['Amy', 'Bob']
 * ```
 */
export class ParticipantRegistry<P extends Participant> {
  readonly discipline: Discipline;
  readonly duplicatePolicy: DuplicatePolicy;

  private readonly participants: Map<string, P> = new Map();
  private readonly events: DispatchEventEmitter | undefined;

  constructor(options: ParticipantRegistryOptions) {
    this.discipline = options.discipline;
    this.duplicatePolicy = options.duplicatePolicy ?? 'reject';
    this.events = options.events;
  }

  /**
   * Append a participant.
   *
   * @throws InvalidParticipantNameError if the name is empty or contains whitespace
   * @throws DuplicateParticipantError if the name is taken and the policy is 'reject'
   */
  add(participant: P): void {
    const { name } = participant;
    if (typeof name !== 'string' || !NAME_PATTERN.test(name)) {
      throw new InvalidParticipantNameError(String(name));
    }

    const replaced = this.participants.has(name);
    if (replaced && this.duplicatePolicy === 'reject') {
      throw new DuplicateParticipantError(name);
    }

    this.participants.set(name, participant);
    log.debug(replaced ? 'Replaced participant' : 'Registered participant', {
      operation: 'add',
      discipline: this.discipline,
      participant: name,
      size: this.participants.size,
    });
    this.events?.emitParticipantRegistered(this.discipline, name, replaced);
  }

  /**
   * Remove a participant by name.
   *
   * @returns True if a participant was removed, false if none was registered
   */
  remove(name: string): boolean {
    if (!this.participants.delete(name)) {
      return false;
    }
    log.debug('Removed participant', {
      operation: 'remove',
      discipline: this.discipline,
      participant: name,
      size: this.participants.size,
    });
    this.events?.emitParticipantRemoved(this.discipline, name);
    return true;
  }

  /**
   * Look a participant up by name.
   */
  lookup(name: string): P | undefined {
    return this.participants.get(name);
  }

  has(name: string): boolean {
    return this.participants.has(name);
  }

  /**
   * Visit every participant in registration order.
   *
   * Iterates a snapshot: additions and removals made by `fn` apply from
   * the next call.
   */
  forEach(fn: (participant: P, index: number) => void): void {
    const snapshot = Array.from(this.participants.values());
    snapshot.forEach((participant, index) => fn(participant, index));
  }

  /**
   * Registered names in registration order.
   */
  names(): string[] {
    return Array.from(this.participants.keys());
  }

  get size(): number {
    return this.participants.size;
  }

  /**
   * Remove every participant. Emits one `participant.removed` per entry.
   */
  clear(): void {
    for (const name of this.names()) {
      this.remove(name);
    }
  }

  debugInfo(): Record<string, unknown> {
    return {
      discipline: this.discipline,
      duplicatePolicy: this.duplicatePolicy,
      size: this.participants.size,
      participants: this.names(),
    };
  }
}
