import { pino, stdTimeFunctions, Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  /**
   * Pretty print single line logs through pino-pretty. Meant for local development only.
   */
  pretty?: boolean;
}

const developmentLoggerOpts: LoggerOptions = {
  transport: {
    target: 'pino-pretty',
    options: {
      singleLine: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  },
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const opts: LoggerOptions = {
    level: config.level ?? 'info',
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => {
        return {
          level: label,
        };
      },
    },
  };

  return pino(config.pretty ? { ...developmentLoggerOpts, ...opts } : opts);
}
