import { describe, it, expect, vi, afterEach } from 'vitest';

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('takes its level from the configured LOG_LEVEL', async () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.resetModules();

    const { logger } = await import('./logger.js');
    expect(logger.level).toBe('debug');
  });

  it('defaults to info', async () => {
    vi.stubEnv('LOG_LEVEL', '');
    vi.resetModules();

    const { logger } = await import('./logger.js');
    expect(logger.level).toBe('info');
  });

  it('writes only to the console under test', async () => {
    vi.stubEnv('NODE_ENV', 'test');
    vi.resetModules();

    const { logger } = await import('./logger.js');
    expect(logger.transports).toHaveLength(1);
  });
});
