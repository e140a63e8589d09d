/**
 * Logger factory: pino loggers bound to a service identity.
 *
 * JSON lines to stdout by default. Debug mode switches to human-readable
 * output through pino-pretty, colored when asked to or when stdout is a TTY.
 */

import { pino, destination as pinoDestination, type DestinationStream, type Logger, type LoggerOptions as PinoOptions } from 'pino';
import type { ServiceIdentity } from '@keeper/core';

export type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  logLevel: LogLevel;
  /** Forces level debug and human-readable output. */
  logDebug: boolean;
  logJson: boolean;
  logColors: boolean;
  /** Color human-readable output when stdout is a terminal. */
  logAutoColors: boolean;
}

/** Base bindings for a service: only the identity fields that are set. */
export function serviceBindings(identity: ServiceIdentity): Record<string, string> {
  const bindings: Record<string, string> = {};
  if (identity.name) bindings['service'] = identity.name;
  if (identity.version) bindings['version'] = identity.version;
  if (identity.namespace) bindings['namespace'] = identity.namespace;
  return bindings;
}

/**
 * Build the logger for one service. When `destination` is given, JSON lines
 * are written there regardless of the output options.
 */
export function createLogger(
  options: LoggerOptions,
  identity: ServiceIdentity,
  destination?: DestinationStream,
): Logger {
  const config: PinoOptions = {
    level: options.logDebug ? 'debug' : options.logLevel,
    base: serviceBindings(identity),
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (destination) {
    return pino(config, destination);
  }

  if (options.logJson && !options.logDebug) {
    return pino(config, pinoDestination({ dest: 1, sync: true }));
  }

  const colorize =
    options.logColors ||
    ((options.logAutoColors || options.logDebug) && process.stdout.isTTY === true);

  // pino-pretty colors by numeric level, so the label formatter stays off here.
  return pino({
    level: config.level,
    base: config.base,
    messageKey: config.messageKey,
    timestamp: config.timestamp,
    transport: {
      target: 'pino-pretty',
      options: { colorize, destination: 1, ignore: 'pid,hostname' },
    },
  });
}
