import pino from 'pino';
import type { LoggerOptions, TransportSingleOptions } from 'pino';
import type { LoggingConfig } from './config';

export type Logger = pino.Logger;

/**
 * Bot tokens travel inside config objects; none of them may reach a log line.
 */
export const REDACTED_PATHS = ['token', '*.token', 'bots[*].token'];

const prettyTarget: TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
  },
};

export function baseLoggerOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };
}

export function createLogger(config: LoggingConfig): Logger {
  return pino({
    ...baseLoggerOptions(config),
    transport: config.file
      ? {
          targets: [
            { ...prettyTarget, level: config.level },
            {
              target: 'pino/file',
              level: config.level,
              options: { destination: config.file, mkdir: true },
            },
          ],
        }
      : prettyTarget,
  });
}

/**
 * Per-bot child logger so every line carries the bot id
 */
export function createBotLogger(logger: Logger, botId: string): Logger {
  return logger.child({ botId });
}
