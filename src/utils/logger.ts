// Shared pino logger
// Fastify and the assistant services log through the same instance

import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../env.js';

export type { Logger } from 'pino';

function createBaseLogger(): Logger {
  if (env.NODE_ENV === 'development' && env.LOG_LEVEL !== 'silent') {
    return pino({
      level: env.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level: env.LOG_LEVEL });
}

export const logger = createBaseLogger();

export function childLogger(component: string): Logger {
  return logger.child({ component });
}
