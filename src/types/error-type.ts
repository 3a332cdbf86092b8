/**
 * Stable error codes carried by every {@link DispatchError}.
 *
 * Callers branch on these rather than on class identity when errors cross
 * a module boundary (for example when a scenario reports why it halted).
 */
export enum ErrorCode {
  /** A participant name is already registered and the registry rejects duplicates. */
  DUPLICATE_PARTICIPANT = 'duplicate_participant',

  /** A participant name is empty or contains whitespace. */
  INVALID_PARTICIPANT = 'invalid_participant',

  /** A strategy identifier is not in the catalog. */
  UNKNOWN_STRATEGY = 'unknown_strategy',

  /** A line or value is structurally invalid. */
  MALFORMED_INPUT = 'malformed_input',

  /** An escalation chain was built without links. */
  EMPTY_CHAIN = 'empty_chain',

  /** A scenario name is not one of the known drivers. */
  UNKNOWN_SCENARIO = 'unknown_scenario',

  /** An environment variable or option holds an unsupported value. */
  INVALID_CONFIGURATION = 'invalid_configuration',
}

/**
 * Check if a string is one of the standard error codes.
 *
 * @example
 * isErrorCode('unknown_strategy'); // true
 * isErrorCode('timeout');          // false
 */
export function isErrorCode(value: string): value is ErrorCode {
  const codes: string[] = Object.values(ErrorCode);
  return codes.includes(value);
}
