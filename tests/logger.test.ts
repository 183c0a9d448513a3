/**
 * Tests for the logger factory
 */

import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { createLogger, isLogLevel, resolveLogFormat, resolveLogLevel, setLogLevel } from '../src/logging/logger.js';
import { captureLogger } from './helpers/log-capture.js';

describe('resolveLogLevel', () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
  });

  afterAll(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('should default to info', () => {
    expect(resolveLogLevel()).toBe('info');
  });

  it('should read LOG_LEVEL case-insensitively', () => {
    process.env.LOG_LEVEL = 'DEBUG';
    expect(resolveLogLevel()).toBe('debug');
  });

  it('should ignore an unknown LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'chatty';
    expect(resolveLogLevel()).toBe('info');
  });

  it('should prefer an explicit level', () => {
    process.env.LOG_LEVEL = 'debug';
    expect(resolveLogLevel('warn')).toBe('warn');
  });
});

describe('resolveLogFormat', () => {
  const originalFormat = process.env.LOG_FORMAT;

  afterAll(() => {
    if (originalFormat === undefined) {
      delete process.env.LOG_FORMAT;
    } else {
      process.env.LOG_FORMAT = originalFormat;
    }
  });

  it('should honour LOG_FORMAT=json', () => {
    process.env.LOG_FORMAT = 'json';
    expect(resolveLogFormat()).toBe('json');
  });

  it('should prefer an explicit format', () => {
    process.env.LOG_FORMAT = 'json';
    expect(resolveLogFormat('pretty')).toBe('pretty');
  });
});

describe('isLogLevel', () => {
  it('should accept pino levels only', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('createLogger', () => {
  it('should write JSON records with the logger name', () => {
    const capture = captureLogger('Deploy', 'info');
    capture.logger.info('Deploying %s', 'web');
    capture.logger.debug('hidden');

    expect(capture.records).toHaveLength(1);
    expect(capture.records[0]).toMatchObject({ level: 30, name: 'Deploy', msg: 'Deploying web' });
  });

  it('should change level at runtime', () => {
    const capture = captureLogger('Levels', 'info');
    setLogLevel(capture.logger, 'debug');
    capture.logger.debug('now visible');

    expect(capture.messages()).toEqual(['now visible']);
  });

  it('should cache loggers by name and update the level of a cached logger', () => {
    const first = createLogger('cached-logger', { level: 'warn', format: 'json' });
    const second = createLogger('cached-logger', { level: 'debug' });

    expect(second).toBe(first);
    expect(first.level).toBe('debug');
    expect(createLogger('cached-logger')).toBe(first);
  });
});
