/**
 * Subsystem Logging Tests
 */

import { describe, it, expect } from 'vitest';
import { createSubsystemLogger, errorMeta } from './subsystem.js';

describe('createSubsystemLogger', () => {
  it('should bind the subsystem name', () => {
    const logger = createSubsystemLogger('monitor/test');
    expect(logger.subsystem).toBe('monitor/test');
  });

  it('should respect the LOG_LEVEL of the test environment', () => {
    const logger = createSubsystemLogger('monitor/test');
    expect(logger.isLevelEnabled('fatal')).toBe(false);
    expect(logger.isLevelEnabled('debug')).toBe(false);
  });

  it('should accept messages with and without metadata', () => {
    const logger = createSubsystemLogger('monitor/test');
    expect(() => {
      logger.info('plain message');
      logger.warn('with metadata', { value: 42 });
      logger.error('with error', errorMeta(new Error('boom')));
    }).not.toThrow();
  });
});

describe('errorMeta', () => {
  it('should flatten Error instances', () => {
    expect(errorMeta(new TypeError('bad input'))).toEqual({ error: 'bad input', errorName: 'TypeError' });
  });

  it('should stringify other throwables', () => {
    expect(errorMeta('plain failure')).toEqual({ error: 'plain failure' });
    expect(errorMeta(404)).toEqual({ error: '404' });
  });
});
