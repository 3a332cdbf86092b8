/**
 * Tests for the structured logging API.
 */

import { Writable } from 'node:stream';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../../../src/config/index.js';
import {
  configureLogging,
  createLogger,
  getRootLogger,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setRootLogger,
} from '../../../src/logging/index.js';

interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

describe('Logging API', () => {
  let records: LogRecord[];

  beforeEach(() => {
    records = [];
    const stream = new Writable({
      write(chunk, _encoding, callback) {
        records.push(JSON.parse(String(chunk)));
        callback();
      },
    });
    setRootLogger(pino({ level: 'trace' }, stream));
  });

  afterEach(() => {
    setRootLogger(null);
  });

  it('writes each level with its pino level number', () => {
    logError('e');
    logWarn('w');
    logInfo('i');
    logDebug('d');
    logTrace('t');

    expect(records.map((record) => [record.level, record.msg])).toEqual([
      [50, 'e'],
      [40, 'w'],
      [30, 'i'],
      [20, 'd'],
      [10, 't'],
    ]);
  });

  it('attaches structured fields', () => {
    logInfo('Registered participant', { participant: 'Amy', size: 1 });

    expect(records[0]).toMatchObject({ msg: 'Registered participant', participant: 'Amy', size: 1 });
  });

  describe('createLogger', () => {
    it('merges preset fields with call fields', () => {
      const log = createLogger({ component: 'test', operation: 'preset' });
      log.warn('Careful', { operation: 'override', attempt: 2 });

      expect(records[0]).toMatchObject({
        level: 40,
        msg: 'Careful',
        component: 'test',
        operation: 'override',
        attempt: 2,
      });
    });

    it('follows the current root logger', () => {
      const log = createLogger({ component: 'late' });
      setRootLogger(pino({ level: 'silent' }));
      log.error('dropped');

      expect(records).toEqual([]);
    });
  });

  describe('configureLogging', () => {
    it('builds a root logger at the configured level', () => {
      const logger = configureLogging({ ...loadConfig({ DISPATCH_ENV: 'test' }), logLevel: 'warn' });

      expect(logger.level).toBe('warn');
      expect(getRootLogger()).toBe(logger);
    });
  });
});
