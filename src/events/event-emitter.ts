/**
 * Typed event bus shared by the dispatch disciplines.
 *
 * Every discipline instance owns one (or is handed one through its
 * options). Listeners run synchronously inside the dispatch call that
 * emits, so a listener sees events in exactly the order dispatch visits
 * participants.
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { ChainRequest, Discipline } from '../types/participant.js';
import {
  BroadcastEventNames,
  ChainEventNames,
  MessageEventNames,
  ParticipantEventNames,
  StrategyEventNames,
} from './event-names.js';

/**
 * Event payload types
 */
export interface ParticipantEventPayload {
  discipline: Discipline;
  name: string;
  replaced: boolean;
  timestamp: Date;
}

export interface StateBroadcastPayload {
  hour: number;
  recipients: string[];
  timestamp: Date;
}

export interface MessageDeliveredPayload {
  sender: string;
  receiver: string;
  body: string;
  timestamp: Date;
}

export interface MessageDroppedPayload {
  sender: string;
  body: string;
  reason: 'unknown_sender';
  timestamp: Date;
}

export interface StrategyResolvedPayload {
  identifier: string;
  strategyId: string;
  timestamp: Date;
}

export interface StrategyRejectedPayload {
  identifier: string;
  timestamp: Date;
}

export interface ChainOutcomePayload {
  request: ChainRequest;
  label: string;
  linkIndex: number;
  timestamp: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface DispatchEventMap {
  'participant.registered': [payload: ParticipantEventPayload];
  'participant.removed': [payload: ParticipantEventPayload];
  'state.broadcast': [payload: StateBroadcastPayload];
  'message.delivered': [payload: MessageDeliveredPayload];
  'message.dropped': [payload: MessageDroppedPayload];
  'strategy.resolved': [payload: StrategyResolvedPayload];
  'strategy.rejected': [payload: StrategyRejectedPayload];
  'request.approved': [payload: ChainOutcomePayload];
  'request.denied': [payload: ChainOutcomePayload];
}

/**
 * Type-safe event emitter for dispatch events
 */
export class DispatchEventEmitter extends EventEmitter<DispatchEventMap> {
  private readonly instanceId: string;

  constructor() {
    super();
    this.instanceId = randomUUID();
  }

  /**
   * Get the unique instance ID for this emitter
   */
  getInstanceId(): string {
    return this.instanceId;
  }

  emitParticipantRegistered(discipline: Discipline, name: string, replaced: boolean): void {
    this.emit(ParticipantEventNames.PARTICIPANT_REGISTERED, {
      discipline,
      name,
      replaced,
      timestamp: new Date(),
    });
  }

  emitParticipantRemoved(discipline: Discipline, name: string): void {
    this.emit(ParticipantEventNames.PARTICIPANT_REMOVED, {
      discipline,
      name,
      replaced: false,
      timestamp: new Date(),
    });
  }

  emitStateBroadcast(hour: number, recipients: string[]): void {
    this.emit(BroadcastEventNames.STATE_BROADCAST, {
      hour,
      recipients,
      timestamp: new Date(),
    });
  }

  emitMessageDelivered(sender: string, receiver: string, body: string): void {
    this.emit(MessageEventNames.MESSAGE_DELIVERED, {
      sender,
      receiver,
      body,
      timestamp: new Date(),
    });
  }

  emitMessageDropped(sender: string, body: string): void {
    this.emit(MessageEventNames.MESSAGE_DROPPED, {
      sender,
      body,
      reason: 'unknown_sender',
      timestamp: new Date(),
    });
  }

  emitStrategyResolved(identifier: string, strategyId: string): void {
    this.emit(StrategyEventNames.STRATEGY_RESOLVED, {
      identifier,
      strategyId,
      timestamp: new Date(),
    });
  }

  emitStrategyRejected(identifier: string): void {
    this.emit(StrategyEventNames.STRATEGY_REJECTED, {
      identifier,
      timestamp: new Date(),
    });
  }

  emitRequestApproved(request: ChainRequest, label: string, linkIndex: number): void {
    this.emit(ChainEventNames.REQUEST_APPROVED, {
      request,
      label,
      linkIndex,
      timestamp: new Date(),
    });
  }

  emitRequestDenied(request: ChainRequest, label: string, linkIndex: number): void {
    this.emit(ChainEventNames.REQUEST_DENIED, {
      request,
      label,
      linkIndex,
      timestamp: new Date(),
    });
  }
}
