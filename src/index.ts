/**
 * dispatch-core
 *
 * Participant registries with four dispatch disciplines: broadcast
 * notification, strategy selection, mediated messaging and escalation
 * chains.
 *
 * @packageDocumentation
 */

// =============================================================================
// Disciplines
// =============================================================================
export * from './chain/index.js';
export * from './mediator/index.js';
export * from './observer/index.js';
export * from './strategy/index.js';

// =============================================================================
// Registry
// =============================================================================
export {
  ParticipantRegistry,
  type ParticipantRegistryOptions,
} from './registry/participant-registry.js';

// =============================================================================
// Events
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Scenarios and line I/O
// =============================================================================
export * from './io/index.js';
export * from './scenarios/index.js';

// =============================================================================
// Configuration, logging, types
// =============================================================================
export {
  type DispatchConfig,
  type DuplicatePolicy,
  type Environment,
  type ErrorPolicy,
  isProduction,
  loadConfig,
  type LogLevel,
} from './config/index.js';
export {
  type ComponentLogger,
  configureLogging,
  createLogger,
  type LogFields,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
} from './logging/index.js';
export * from './types/index.js';
