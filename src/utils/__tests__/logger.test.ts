import { describe, it, expect } from 'vitest';
import { logger, loggerOptions, moduleLogger } from '../logger.js';

describe('logger', () => {
  it('should take its level from LOG_LEVEL', () => {
    expect(process.env.LOG_LEVEL).toBe('silent');
    expect(loggerOptions.level).toBe('silent');
    expect(logger.level).toBe('silent');
  });

  it('should not use the pretty transport outside development', () => {
    expect(loggerOptions).not.toHaveProperty('transport');
  });

  it('should tag module loggers with their module', () => {
    const log = moduleLogger('orchestrator');

    expect(log.bindings()).toMatchObject({ module: 'orchestrator' });
    expect(log.level).toBe('silent');
  });
});
