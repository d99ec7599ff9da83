// Process logger
// pino is Fastify's logger too, so routes and the agent core share one stream

import { pino, type Logger, type LoggerOptions } from 'pino';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function loggerOptions(level: string = defaultLevel()): LoggerOptions {
  const options: LoggerOptions = { level };

  if (process.env.NODE_ENV === 'development' && process.env.LOG_PRETTY !== 'false') {
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

export const logger: Logger = pino(loggerOptions());

export function createLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export type { Logger };
