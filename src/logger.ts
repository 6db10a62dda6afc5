import pino, { type BaseLogger, type LoggerOptions, type Logger as PinoLogger } from 'pino';
import type { AppConfig } from './config.js';

/** The slice of a pino logger the scraping components write to. Fastify's `app.log` fits it too. */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * pino options for the service. With `LOG_FILE` set, records go to both the
 * given file descriptor and the file.
 */
export function loggerOptions(config: AppConfig, fd: 1 | 2 = 1): LoggerOptions {
  const level = config.log.level;
  const options: LoggerOptions = {
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (config.log.file) {
    options.transport = {
      targets: [
        { target: 'pino/file', level, options: { destination: fd } },
        { target: 'pino/file', level, options: { destination: config.log.file, mkdir: true } },
      ],
    };
  }
  return options;
}

/** Stand-alone logger for the CLIs; the MCP stdio server passes fd 2 to keep stdout clean. */
export function createLogger(config: AppConfig, fd: 1 | 2 = 1): PinoLogger {
  const options = loggerOptions(config, fd);
  if (options.transport) return pino(options);
  return pino(options, pino.destination(fd));
}

export const silentLogger: Logger = pino({ level: 'silent' });
