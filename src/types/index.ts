/**
 * Shared types: participant contracts, error codes and error classes.
 */

export { ErrorCode, isErrorCode } from './error-type.js';
export {
  ConfigurationError,
  DispatchError,
  DuplicateParticipantError,
  EmptyChainError,
  InvalidParticipantNameError,
  MalformedInputError,
  UnknownScenarioError,
  UnknownStrategyError,
} from './errors.js';
export type {
  ApprovalHandler,
  ChainRequest,
  Discipline,
  Message,
  MessageReceiver,
  Participant,
  StateReceiver,
} from './participant.js';
