/**
 * Mediated messaging: participants never address each other, they hand
 * messages to the router, which relays them to everyone else.
 *
 * @example
 * ```typescript
 * const room = new MediatedRouter({ sink });
 * room.addUser('A');
 * room.addUser('B');
 * room.addUser('C');
 *
 * room.sendFrom('A', 'hi');
 * // sink: "B received: hi", "C received: hi"
 *
 * room.sendFrom('Zed', 'hello?'); // unknown sender, dropped
 * ```
 */

import type { DuplicatePolicy } from '../config/index.js';
import { DispatchEventEmitter } from '../events/event-emitter.js';
import type { LineSink } from '../io/line-io.js';
import { createLogger } from '../logging/index.js';
import { ParticipantRegistry } from '../registry/participant-registry.js';
import type { MessageReceiver } from '../types/participant.js';
import { ChatParticipant } from './chat-participant.js';

const log = createLogger({ component: 'mediated-router' });

export interface MediatedRouterOptions {
  /** Sink handed to participants created by {@link MediatedRouter.addUser} */
  sink?: LineSink;
  duplicatePolicy?: DuplicatePolicy;
  events?: DispatchEventEmitter;
}

export class MediatedRouter {
  readonly events: DispatchEventEmitter;

  private readonly registry: ParticipantRegistry<MessageReceiver>;
  private readonly sink: LineSink | undefined;

  constructor(options: MediatedRouterOptions = {}) {
    this.events = options.events ?? new DispatchEventEmitter();
    this.sink = options.sink;
    this.registry = new ParticipantRegistry<MessageReceiver>({
      discipline: 'mediated-route',
      duplicatePolicy: options.duplicatePolicy,
      events: this.events,
    });
  }

  /**
   * Create a {@link ChatParticipant} on the router's sink and register it.
   *
   * @throws DuplicateParticipantError if the name is taken and duplicates are rejected
   */
  addUser(name: string): ChatParticipant {
    const participant = new ChatParticipant(name, this.sink);
    this.registry.add(participant);
    return participant;
  }

  /**
   * Register a caller-built participant.
   */
  addParticipant(participant: MessageReceiver): void {
    this.registry.add(participant);
  }

  removeUser(name: string): boolean {
    return this.registry.remove(name);
  }

  lookup(name: string): MessageReceiver | undefined {
    return this.registry.lookup(name);
  }

  /**
   * Deliver a message to every registered participant other than the
   * sender, in registration order. The sender need not be registered.
   *
   * @returns Names of the receivers, in delivery order
   */
  send(senderName: string, body: string): string[] {
    const receivers: string[] = [];
    this.registry.forEach((participant) => {
      if (participant.name === senderName) {
        return;
      }
      participant.receivesMessage(senderName, body);
      receivers.push(participant.name);
      this.events.emitMessageDelivered(senderName, participant.name, body);
    });
    return receivers;
  }

  /**
   * Entry point for participant-initiated sends. Messages from names that
   * were never registered are dropped without output.
   *
   * @returns Names of the receivers; empty when the message was dropped
   */
  sendFrom(senderName: string, body: string): string[] {
    if (!this.registry.has(senderName)) {
      log.debug('Dropped message from unknown sender', { operation: 'send_from', sender: senderName });
      this.events.emitMessageDropped(senderName, body);
      return [];
    }
    return this.send(senderName, body);
  }

  participants(): string[] {
    return this.registry.names();
  }
}
