// Shared pino logger for services and scripts
// Fastify builds its request logger from the same options, so both write the same format

import pino, { type Logger } from 'pino';
import { env } from '../env.js';

export type { Logger };

export interface LogOptions {
  level: string;
  transport?: {
    target: string;
    options: Record<string, string>;
  };
}

export function loggerOptions(level: string = env.LOG_LEVEL): LogOptions {
  if (env.NODE_ENV !== 'development') {
    return { level };
  }

  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

export function createLogger(level: string = env.LOG_LEVEL): Logger {
  return pino(loggerOptions(level));
}

export const logger = createLogger();
