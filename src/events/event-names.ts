/**
 * Standard event names published by the dispatch disciplines.
 */

/**
 * Event names for registry membership
 */
export const ParticipantEventNames = {
  /** Emitted after a participant is added (or replaces another) */
  PARTICIPANT_REGISTERED: 'participant.registered',

  /** Emitted after a participant is removed */
  PARTICIPANT_REMOVED: 'participant.removed',
} as const;

/**
 * Event names for broadcast notification
 */
export const BroadcastEventNames = {
  /** Emitted once per advance, after every participant has been notified */
  STATE_BROADCAST: 'state.broadcast',
} as const;

/**
 * Event names for mediated messaging
 */
export const MessageEventNames = {
  /** Emitted for each receiver a message reaches */
  MESSAGE_DELIVERED: 'message.delivered',

  /** Emitted when a message from an unregistered sender is dropped */
  MESSAGE_DROPPED: 'message.dropped',
} as const;

/**
 * Event names for strategy selection
 */
export const StrategyEventNames = {
  /** Emitted when an identifier resolves to a catalog entry */
  STRATEGY_RESOLVED: 'strategy.resolved',

  /** Emitted when an identifier is not in the catalog */
  STRATEGY_REJECTED: 'strategy.rejected',
} as const;

/**
 * Event names for escalation chains
 */
export const ChainEventNames = {
  /** Emitted when a link accepts a request */
  REQUEST_APPROVED: 'request.approved',

  /** Emitted when no link accepts a request */
  REQUEST_DENIED: 'request.denied',
} as const;

/**
 * All event names combined
 */
export const EventNames = {
  ...ParticipantEventNames,
  ...BroadcastEventNames,
  ...MessageEventNames,
  ...StrategyEventNames,
  ...ChainEventNames,
} as const;

/**
 * Type representing all possible event names
 */
export type EventName = (typeof EventNames)[keyof typeof EventNames];
