// Application logger
// Same pino setup the tool host hands to Fastify, usable outside request scope

import { pino } from 'pino';
import type { LoggerOptions } from 'pino';
import { env } from '../env.js';

export function loggerOptions(): LoggerOptions {
  const options: LoggerOptions = { level: env.LOG_LEVEL };

  if (env.NODE_ENV !== 'test' && env.LOG_LEVEL !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

export const logger = pino(loggerOptions());

export function componentLogger(component: string) {
  return logger.child({ component });
}
