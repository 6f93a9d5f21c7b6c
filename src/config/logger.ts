import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { AppConfig } from './env.js';

export type { Logger };

/** Shared by the root logger and fastify's request logger. */
export const loggerOptions = (config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>, name = 'mail-gateway'): LoggerOptions => ({
  name,
  level: config.logLevel,
  base: { env: config.nodeEnv },
  redact: {
    paths: [
      'accessToken',
      'refreshToken',
      'clientSecret',
      'codeVerifier',
      '*.accessToken',
      '*.refreshToken',
      '*.clientSecret',
      'req.headers.authorization',
    ],
    censor: '[redacted]',
  },
});

export const createLogger = (config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>, name = 'mail-gateway'): Logger =>
  pino(loggerOptions(config, name));
