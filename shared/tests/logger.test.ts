/**
 * Tests for the Logger module.
 * Covers log formatting, context handling, level gating, and error output.
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { Logger } from '../src/utils/logging/logger.js';
import { logCapture } from '../src/utils/logging/logCapture.js';

describe('Logger Module', () => {
  let logger: Logger;
  let printed: { log: string[]; warn: string[]; error: string[] };

  beforeEach(() => {
    logger = new Logger('info');
    logCapture.clear();
    printed = { log: [], warn: [], error: [] };

    // Replace console methods for the duration of each test
    mock.method(console, 'log', (message: unknown) => {
      printed.log.push(String(message));
    });
    mock.method(console, 'warn', (message: unknown) => {
      printed.warn.push(String(message));
    });
    mock.method(console, 'error', (message: unknown) => {
      printed.error.push(String(message));
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('info logging', () => {
    it('should log info messages to console.log', () => {
      logger.info('Test info message');

      assert.strictEqual(printed.log.length, 1);
      assert.match(printed.log[0], /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO  Test info message$/);
    });

    it('should format component and domain first', () => {
      logger.info('Cache invalidated', { domain: 'notes', component: 'CacheCoordinator' });

      assert.ok(printed.log[0].endsWith(' INFO  [component=CacheCoordinator, domain=notes] Cache invalidated'));
    });

    it('should include custom context fields', () => {
      logger.info('Cache miss', { component: 'CacheCoordinator', ageMs: 1200 });

      assert.ok(printed.log[0].includes('[component=CacheCoordinator, ageMs=1200]'));
    });

    it('should handle empty context', () => {
      logger.info('No context', {});

      assert.ok(printed.log[0].endsWith(' INFO  No context'));
    });
  });

  describe('warn logging', () => {
    it('should log warn messages to console.warn', () => {
      logger.warn('Background refresh failed: timeout', { component: 'BackgroundRefresh' });

      assert.strictEqual(printed.warn.length, 1);
      assert.ok(printed.warn[0].endsWith(' WARN  [component=BackgroundRefresh] Background refresh failed: timeout'));
    });
  });

  describe('error logging', () => {
    it('should log the message and the error message', () => {
      logger.error('Refresh failed', new Error('socket hang up'));

      assert.strictEqual(printed.error.length, 2);
      assert.ok(printed.error[0].endsWith(' ERROR Refresh failed'));
      assert.strictEqual(printed.error[1], '  Error: socket hang up');
    });

    it('should log the stack trace only at debug level', () => {
      logger.setLevel('debug');
      logger.error('Refresh failed', new Error('boom'));

      assert.strictEqual(printed.error.length, 3);
      assert.ok(printed.error[2].startsWith('  Stack: Error: boom'));
    });

    it('should print non-Error details as JSON', () => {
      logger.error('Refresh failed', { status: 503 });

      assert.strictEqual(printed.error[1], '  Details: {\n  "status": 503\n}');
    });
  });

  describe('level gating', () => {
    it('should not print debug messages at info level', () => {
      logger.debug('Cache hit');

      assert.strictEqual(printed.log.length, 0);
    });

    it('should print debug messages at debug level', () => {
      logger.setLevel('debug');
      logger.debug('Cache hit');

      assert.strictEqual(printed.log.length, 1);
      assert.ok(printed.log[0].endsWith(' DEBUG Cache hit'));
    });

    it('should only print errors at error level', () => {
      logger.setLevel('error');
      logger.info('quiet');
      logger.warn('quiet');
      logger.error('loud');

      assert.strictEqual(printed.log.length, 0);
      assert.strictEqual(printed.warn.length, 0);
      assert.strictEqual(printed.error.length, 1);
      assert.strictEqual(logger.getLevel(), 'error');
    });

    it('should capture messages even when they are not printed', () => {
      logger.debug('Cache hit', { component: 'CacheCoordinator' });

      const { logs } = logCapture.getLogs({ component: 'CacheCoordinator' });
      assert.strictEqual(logs.length, 1);
      assert.strictEqual(logs[0].level, 'debug');
      assert.strictEqual(logs[0].message, 'Cache hit');
    });
  });
});
