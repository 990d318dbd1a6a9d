import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildTransport } from '../logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('takes its level from the validated environment', async () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    vi.resetModules();

    const { logger } = await import('../logger.js');
    expect(logger.level).toBe('error');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});

describe('buildTransport', () => {
  it('pretty-prints in development', () => {
    expect(buildTransport('development')).toEqual({
      target: 'pino-pretty',
      options: { colorize: true, ignore: 'pid,hostname' },
    });
  });

  it('writes raw JSON in production and tests', () => {
    expect(buildTransport('production')).toBeUndefined();
    expect(buildTransport('test')).toBeUndefined();
  });
});
