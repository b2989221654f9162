/**
 * Tests for the console logger
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConsoleLogger, levelFromEnv } from '../../packages/core/src/utils/logger.js';
import { LogLevel } from '../../packages/core/src/types/index.js';

function capture(level: LogLevel): { logger: ConsoleLogger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new ConsoleLogger(level, line => lines.push(line)), lines };
}

describe('ConsoleLogger', () => {
  it('should drop messages below the current level', () => {
    const { logger, lines } = capture(LogLevel.WARN);
    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    assert.equal(lines.length, 2);
    assert.match(lines[0] ?? '', /\[WARN\]  warn$/);
    assert.match(lines[1] ?? '', /\[ERROR\] error$/);
  });

  it('should prefix each line with an ISO timestamp', () => {
    const { logger, lines } = capture(LogLevel.INFO);
    logger.info('resolved');
    assert.match(lines[0] ?? '', /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[INFO\]  resolved$/);
  });

  it('should render object metadata as JSON', () => {
    const { logger, lines } = capture(LogLevel.DEBUG);
    logger.debug('plan', { build: 2 });
    assert.match(lines[0] ?? '', /\[DEBUG\] plan\n\{\n {2}"build": 2\n\}$/);
  });

  it('should render errors with their message', () => {
    const { logger, lines } = capture(LogLevel.ERROR);
    logger.error('failed', new Error('boom'));
    assert.match(lines[0] ?? '', /"message": "boom"/);
  });

  it('should change level at runtime', () => {
    const { logger, lines } = capture(LogLevel.ERROR);
    logger.debug('hidden');
    logger.setLevel(LogLevel.DEBUG);
    logger.debug('shown');

    assert.equal(logger.getLevel(), LogLevel.DEBUG);
    assert.equal(lines.length, 1);
    assert.match(lines[0] ?? '', /\[DEBUG\] shown$/);
  });
});

describe('levelFromEnv', () => {
  it('should enable debug for every truthy verbose flag', () => {
    for (const value of ['1', 'true', 'YES']) {
      assert.equal(levelFromEnv({ RESOLVER_VERBOSE: value }), LogLevel.DEBUG);
    }
  });

  it('should fall back to the NODE_ENV default otherwise', () => {
    assert.equal(levelFromEnv({}), LogLevel.ERROR);
    assert.equal(levelFromEnv({ RESOLVER_VERBOSE: 'no' }), LogLevel.ERROR);
    assert.equal(levelFromEnv({ RESOLVER_VERBOSE: 'maybe', NODE_ENV: 'development' }), LogLevel.INFO);
  });
});
