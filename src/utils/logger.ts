/**
 * Logging with Pino - pretty output in development, silent under test unless LOG_LEVEL is set
 */

import pino from 'pino';

const nodeEnv = process.env.NODE_ENV || 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
