/**
 * colbridge — logging
 *
 * JSON lines through pino. Components take an optional logger and log through
 * a child tagged with their name; config-driven entry points build theirs at
 * the configured level.
 */

import pino from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = Level | 'silent';

export interface LoggerOptions {
  /** @default process.env.LOG_LEVEL, else 'info' */
  level?:       LogLevel;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL'];
  switch (raw) {
    case 'fatal': case 'error': case 'warn': case 'info':
    case 'debug': case 'trace': case 'silent':
      return raw;
    default:
      return 'info';
  }
}

/**
 * Create a logger. Lines are JSON with an ISO timestamp and the level
 * rendered as its label.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const config = {
    level: options.level ?? levelFromEnv(),
    base: { service: 'colbridge' },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination !== undefined ? pino(config, options.destination) : pino(config);
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Child of `parent` (or the main logger) tagged with a component name.
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

/**
 * Component logger at the level a configuration names, independent of
 * LOG_LEVEL.
 */
export function configuredLogger(
  config:       { readonly logLevel: LogLevel },
  component:    string,
  destination?: DestinationStream,
): Logger {
  return componentLogger(component, createLogger({ level: config.logLevel, destination }));
}
