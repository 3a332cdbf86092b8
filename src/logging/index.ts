/**
 * Structured logging API.
 *
 * Thin layer over pino: one process-wide root logger, built lazily from
 * {@link loadConfig}, and component loggers that preset fields on every
 * record. Records always go to stderr so that scenario output on stdout
 * stays byte-exact.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { type DispatchConfig, loadConfig } from '../config/index.js';

/**
 * Structured logging fields.
 *
 * All fields are optional. Common fields include:
 * - component: subsystem identifier (e.g. "registry", "escalation-chain")
 * - operation: operation being performed (e.g. "advance", "send")
 * - participant: participant name the record is about
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

type LogMethod = 'error' | 'warn' | 'info' | 'debug' | 'trace';

let rootLogger: Logger | null = null;

function buildLogger(config: DispatchConfig): Logger {
  const options: LoggerOptions = {
    name: 'dispatch-core',
    level: config.logLevel,
  };

  if (config.environment === 'development' && config.logLevel !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, destination: 2 },
    };
    return pino(options);
  }

  return pino(options, pino.destination(2));
}

/**
 * Get the root logger, building it from the environment on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = buildLogger(loadConfig());
  }
  return rootLogger;
}

/**
 * Rebuild the root logger from an explicit configuration.
 *
 * Loggers returned by {@link createLogger} pick the new root up on their
 * next call.
 */
export function configureLogging(config: DispatchConfig): Logger {
  rootLogger = buildLogger(config);
  return rootLogger;
}

/**
 * Replace the root logger outright (tests hand in a logger writing to a
 * memory stream).
 *
 * @internal
 */
export function setRootLogger(logger: Logger | null): void {
  rootLogger = logger;
}

function write(level: LogMethod, message: string, fields?: LogFields): void {
  const logger = getRootLogger();
  if (fields) {
    logger[level](fields, message);
  } else {
    logger[level](message);
  }
}

/**
 * Log an ERROR level message with structured fields.
 */
export function logError(message: string, fields?: LogFields): void {
  write('error', message, fields);
}

/**
 * Log a WARN level message. Used when a scenario halts or skips a line.
 */
export function logWarn(message: string, fields?: LogFields): void {
  write('warn', message, fields);
}

/**
 * Log an INFO level message.
 */
export function logInfo(message: string, fields?: LogFields): void {
  write('info', message, fields);
}

/**
 * Log a DEBUG level message. Registration and per-dispatch detail go here.
 */
export function logDebug(message: string, fields?: LogFields): void {
  write('debug', message, fields);
}

/**
 * Log a TRACE level message.
 */
export function logTrace(message: string, fields?: LogFields): void {
  write('trace', message, fields);
}

/**
 * Create a logger with preset fields.
 *
 * @example
 * const log = createLogger({ component: 'mediated-router' });
 * log.debug('Dropped message from unknown sender', { sender: 'Zed' });
 * // Logs: { component: 'mediated-router', sender: 'Zed' }
 */
export function createLogger(defaultFields: LogFields) {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  return {
    error: (message: string, fields?: LogFields) => logError(message, mergeFields(fields)),
    warn: (message: string, fields?: LogFields) => logWarn(message, mergeFields(fields)),
    info: (message: string, fields?: LogFields) => logInfo(message, mergeFields(fields)),
    debug: (message: string, fields?: LogFields) => logDebug(message, mergeFields(fields)),
    trace: (message: string, fields?: LogFields) => logTrace(message, mergeFields(fields)),
  };
}

export type ComponentLogger = ReturnType<typeof createLogger>;
