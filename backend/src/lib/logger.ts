/**
 * Structured Logger
 * One pino root for the server, the worker and the CLI; modules log through child loggers.
 */

import pino from 'pino';

export type Logger = pino.Logger;

const isTest = process.env.NODE_ENV === 'test';
const isDevelopment = process.env.NODE_ENV === 'development';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Keys can reach log lines through logged config objects
  redact: {
    paths: ['apiKey', '*.apiKey', '*.*.apiKey', 'qdrantApiKey', '*.qdrantApiKey', 'headers.authorization'],
    censor: '[redacted]',
  },
  base: {
    service: 'threadlens',
    version: process.env.npm_package_version || '0.1.0',
  },
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
