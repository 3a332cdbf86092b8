/**
 * Environment-driven configuration.
 *
 * Environment Variables:
 *   DISPATCH_ENV              - development, test, production
 *   DISPATCH_LOG_LEVEL        - fatal, error, warn, info, debug, trace, silent
 *   DISPATCH_DUPLICATE_POLICY - reject, replace
 *   DISPATCH_ERROR_POLICY     - halt, skip
 */

import { ConfigurationError } from '../types/errors.js';

export const ENVIRONMENTS = ['development', 'test', 'production'] as const;
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const DUPLICATE_POLICIES = ['reject', 'replace'] as const;
export const ERROR_POLICIES = ['halt', 'skip'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * What a registry does when a name is added twice.
 *
 * - `reject`: throw {@link DuplicateParticipantError}
 * - `replace`: the new participant takes over the name and its slot
 */
export type DuplicatePolicy = (typeof DUPLICATE_POLICIES)[number];

/**
 * What a scenario does on a malformed line or unknown strategy.
 *
 * - `halt`: report and stop the batch
 * - `skip`: report, drop the line and carry on
 */
export type ErrorPolicy = (typeof ERROR_POLICIES)[number];

export interface DispatchConfig {
  environment: Environment;
  logLevel: LogLevel;
  duplicatePolicy: DuplicatePolicy;
  errorPolicy: ErrorPolicy;
}

type Env = Record<string, string | undefined>;

function pick<T extends string>(
  env: Env,
  setting: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[setting];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(setting, raw, allowed);
  }
  return match;
}

/**
 * Build the configuration from environment variables.
 *
 * Without `DISPATCH_ENV` the environment follows `NODE_ENV`, and is
 * `production` when that is unset or unrecognised.
 *
 * @throws ConfigurationError when a variable holds an unsupported value
 */
export function loadConfig(env: Env = process.env): DispatchConfig {
  const environment = pick(
    env,
    'DISPATCH_ENV',
    ENVIRONMENTS,
    ENVIRONMENTS.find((candidate) => candidate === env.NODE_ENV) ?? 'production'
  );

  return {
    environment,
    logLevel: pick(env, 'DISPATCH_LOG_LEVEL', LOG_LEVELS, environment === 'test' ? 'silent' : 'info'),
    duplicatePolicy: pick(env, 'DISPATCH_DUPLICATE_POLICY', DUPLICATE_POLICIES, 'reject'),
    errorPolicy: pick(env, 'DISPATCH_ERROR_POLICY', ERROR_POLICIES, 'halt'),
  };
}

export const isProduction = (config: DispatchConfig): boolean =>
  config.environment === 'production';
