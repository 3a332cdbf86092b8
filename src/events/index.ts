/**
 * Events module: event names and the typed emitter.
 */

// Event emitter
export {
  type ChainOutcomePayload,
  DispatchEventEmitter,
  type DispatchEventMap,
  type MessageDeliveredPayload,
  type MessageDroppedPayload,
  type ParticipantEventPayload,
  type StateBroadcastPayload,
  type StrategyRejectedPayload,
  type StrategyResolvedPayload,
} from './event-emitter.js';
// Event names
export {
  BroadcastEventNames,
  ChainEventNames,
  type EventName,
  EventNames,
  MessageEventNames,
  ParticipantEventNames,
  StrategyEventNames,
} from './event-names.js';
