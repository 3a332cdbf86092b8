/**
 * Error types for the dispatch disciplines.
 */

import { ErrorCode } from './error-type.js';

/**
 * Base error class for every failure raised by this package.
 */
export class DispatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'DispatchError';
    this.code = code;
  }
}

/**
 * Error thrown when a name is registered twice under the `reject` policy.
 */
export class DuplicateParticipantError extends DispatchError {
  readonly participantName: string;

  constructor(participantName: string) {
    super(ErrorCode.DUPLICATE_PARTICIPANT, `Participant already registered: '${participantName}'`);
    this.name = 'DuplicateParticipantError';
    this.participantName = participantName;
  }
}

/**
 * Error thrown when a participant name cannot be used as a registry key.
 */
export class InvalidParticipantNameError extends DispatchError {
  readonly participantName: string;

  constructor(participantName: string) {
    super(
      ErrorCode.INVALID_PARTICIPANT,
      `Participant name must be a non-empty token without whitespace, got '${participantName}'`
    );
    this.name = 'InvalidParticipantNameError';
    this.participantName = participantName;
  }
}

/**
 * Error thrown when a strategy identifier is not in the catalog.
 */
export class UnknownStrategyError extends DispatchError {
  readonly identifier: string;
  readonly knownIdentifiers: string[];

  constructor(identifier: string, knownIdentifiers: string[]) {
    const known = knownIdentifiers.length > 0 ? knownIdentifiers.join(', ') : 'none';
    super(ErrorCode.UNKNOWN_STRATEGY, `Unknown strategy '${identifier}'. Known: ${known}`);
    this.name = 'UnknownStrategyError';
    this.identifier = identifier;
    this.knownIdentifiers = knownIdentifiers;
  }
}

/**
 * Error thrown for structurally invalid input: a bad line, a token that is
 * not an integer, or input that ends before a required value.
 */
export class MalformedInputError extends DispatchError {
  readonly input: string | undefined;

  constructor(message: string, input?: string) {
    super(ErrorCode.MALFORMED_INPUT, message);
    this.name = 'MalformedInputError';
    this.input = input;
  }
}

/**
 * Error thrown when an escalation chain is built without links.
 */
export class EmptyChainError extends DispatchError {
  constructor() {
    super(ErrorCode.EMPTY_CHAIN, 'Escalation chain needs at least one link');
    this.name = 'EmptyChainError';
  }
}

/**
 * Error thrown when a scenario name has no driver.
 */
export class UnknownScenarioError extends DispatchError {
  readonly scenario: string;

  constructor(scenario: string, knownScenarios: readonly string[]) {
    super(
      ErrorCode.UNKNOWN_SCENARIO,
      `Unknown scenario '${scenario}'. Expected one of: ${knownScenarios.join(', ')}`
    );
    this.name = 'UnknownScenarioError';
    this.scenario = scenario;
  }
}

/**
 * Error thrown when configuration holds an unsupported value.
 */
export class ConfigurationError extends DispatchError {
  readonly setting: string;

  constructor(setting: string, value: string, allowed: readonly string[]) {
    super(
      ErrorCode.INVALID_CONFIGURATION,
      `Invalid value '${value}' for ${setting}. Expected one of: ${allowed.join(', ')}`
    );
    this.name = 'ConfigurationError';
    this.setting = setting;
  }
}
