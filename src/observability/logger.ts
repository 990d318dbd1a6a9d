import pino from 'pino';
import { env } from '../config/env.js';
import type { Env } from '../config/env.js';

export function buildTransport(nodeEnv: Env['NODE_ENV']): pino.TransportSingleOptions | undefined {
  // Raw JSON lines in production and under the test runner
  if (nodeEnv === 'production' || nodeEnv === 'test') return undefined;
  return { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } };
}

export const logger = pino({
  level: env.LOG_LEVEL,
  transport: buildTransport(env.NODE_ENV),
});
