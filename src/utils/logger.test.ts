import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLogger, LOG_LEVEL_ENV } from './logger.js';

describe('createLogger', () => {
  const original = process.env[LOG_LEVEL_ENV];

  beforeEach(() => {
    delete process.env[LOG_LEVEL_ENV];
  });

  afterEach(() => {
    if (original === undefined) {
      delete process.env[LOG_LEVEL_ENV];
    } else {
      process.env[LOG_LEVEL_ENV] = original;
    }
  });

  it('defaults to warn', () => {
    expect(createLogger().level).toBe('warn');
  });

  it('reads the level from the environment', () => {
    process.env[LOG_LEVEL_ENV] = 'debug';

    expect(createLogger().level).toBe('debug');
  });

  it('prefers an explicit level', () => {
    process.env[LOG_LEVEL_ENV] = 'debug';

    expect(createLogger('silent').level).toBe('silent');
  });
});
