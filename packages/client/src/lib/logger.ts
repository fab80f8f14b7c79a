import { pino, type Logger, type LoggerOptions } from 'pino';
import type { ClientConfig } from '../config/index.js';

/**
 * Returns Pino logger options for the client.
 * Pretty-printed with colors when `prettyLogs` is set, compact JSON otherwise.
 */
export function buildLoggerOptions(config: Pick<ClientConfig, 'logLevel' | 'prettyLogs'>): LoggerOptions {
  return {
    name: 'exakit',
    level: config.logLevel,
    // the bearer token travels in headers; keep it out of every log line
    redact: ['headers.Authorization', 'apiToken'],
    ...(config.prettyLogs && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };
}

export function createLogger(config: Pick<ClientConfig, 'logLevel' | 'prettyLogs'>): Logger {
  return pino(buildLoggerOptions(config));
}

export type { Logger };
