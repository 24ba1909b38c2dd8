/**
 * Logging with Pino - secret-like keys are redacted
 */

import pino from 'pino';
import { getEnvConfig } from '@/core/env';

const redactPaths = [
  'apiKey',
  'api_key',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
];

const env = getEnvConfig();

export const logger = pino({
  level: env.logLevel,
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    env.nodeEnv === 'development'
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
