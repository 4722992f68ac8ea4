// Root logger (pino) shared by the HTTP server and the workflow services

import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { env } from '../env.js';

function buildOptions(): LoggerOptions {
  if (env.NODE_ENV === 'test') {
    return { level: 'silent' };
  }

  if (env.NODE_ENV === 'production') {
    return { level: env.LOG_LEVEL };
  }

  return {
    level: env.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}

export const loggerOptions = buildOptions();

export const logger = pino(loggerOptions);

export type Logger = typeof logger;
