/**
 * Logger factory
 *
 * All log output goes to stderr so stdout stays clean for command output.
 * Pretty, human-readable lines on a terminal; JSON lines when piped or when
 * LOG_FORMAT=json.
 */

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';
import pretty from 'pino-pretty';
import { colorsEnabled } from '../cli/colors.js';

export type { Logger };

export type LogLevel = LevelWithSilent;

export type LogFormat = 'pretty' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  /** Minimum level; falls back to LOG_LEVEL, then 'info' */
  level?: LogLevel;
  /** Output format; falls back to LOG_FORMAT, then pretty on a TTY */
  format?: LogFormat;
  /** Write JSON lines here instead of stderr. Such loggers are never cached. */
  destination?: DestinationStream;
}

const loggers = new Map<string, Logger>();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the effective level: explicit option > LOG_LEVEL > info
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

export function resolveLogFormat(format?: LogFormat): LogFormat {
  if (format) {
    return format;
  }
  if (process.env.LOG_FORMAT?.toLowerCase() === 'json') {
    return 'json';
  }
  return process.stderr.isTTY ? 'pretty' : 'json';
}

function createDestination(format: LogFormat): DestinationStream {
  if (format === 'pretty') {
    return pretty({
      destination: 2,
      sync: true,
      colorize: colorsEnabled(),
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
    });
  }
  return pino.destination({ dest: 2, sync: true });
}

/**
 * Create (or fetch) the logger for a name.
 *
 * Loggers are cached per name. Asking again with a level updates the cached
 * logger's level, so a level chosen after argument parsing still applies.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  if (!options.destination) {
    const cached = loggers.get(name);
    if (cached) {
      if (options.level) {
        cached.level = options.level;
      }
      return cached;
    }
  }

  const logger = pino(
    {
      name,
      level: resolveLogLevel(options.level),
      base: { pid: process.pid },
    },
    options.destination ?? createDestination(resolveLogFormat(options.format))
  );

  if (!options.destination) {
    loggers.set(name, logger);
  }
  return logger;
}

export function setLogLevel(logger: Logger, level: LogLevel): void {
  logger.level = level;
}
