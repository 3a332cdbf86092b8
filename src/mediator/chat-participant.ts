import type { LineSink } from '../io/line-io.js';
import type { Message, MessageReceiver } from '../types/participant.js';

/**
 * Mediator participant that logs every message it receives and writes
 * `"<name> received: <body>"` to the router's sink.
 */
export class ChatParticipant implements MessageReceiver {
  readonly name: string;
  private readonly inbox: Message[] = [];

  constructor(
    name: string,
    private readonly sink?: LineSink
  ) {
    this.name = name;
  }

  receivesMessage(sender: string, body: string): void {
    this.inbox.push({ sender, body });
    this.sink?.writeLine(`${this.name} received: ${body}`);
  }

  /** Messages received so far, oldest first */
  get log(): readonly Message[] {
    return this.inbox;
  }
}
