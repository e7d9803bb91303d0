/**
 * Logger backed by pino
 */

import { isLogLevel, type LogData, type Logger, type LogLevel } from '@tidewatch/core';
import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

export type PinoLoggerOptions = {
  /** Falls back to LOG_LEVEL, then `info` */
  level?: LogLevel;
  name?: string;
  /** Defaults to stderr so stdout stays free for the host process */
  destination?: DestinationStream;
};

const REDACT_PATHS = [
  'password',
  'token',
  'apiKey',
  'api_key',
  'secret',
  'authorization',
  '*.password',
  '*.token',
  '*.apiKey',
  '*.secret',
  'headers.authorization',
  'headers.cookie'
];

type Method = 'error' | 'warn' | 'info' | 'debug' | 'trace';

function resolveLevel(level: LogLevel | undefined): LogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : 'info';
}

function adapt(instance: PinoInstance): Logger {
  const log = (method: Method, obj: unknown, msg?: string): void => {
    if (typeof obj === 'string' && msg === undefined) {
      instance[method](obj);
      return;
    }
    instance[method](obj, msg);
  };

  return {
    get level() {
      return instance.level;
    },
    error: (obj, msg) => log('error', obj, msg),
    warn: (obj, msg) => log('warn', obj, msg),
    info: (obj, msg) => log('info', obj, msg),
    debug: (obj, msg) => log('debug', obj, msg),
    trace: (obj, msg) => log('trace', obj, msg),
    child: (bindings: LogData) => adapt(instance.child(bindings))
  };
}

/**
 * Create a JSON logger. Secrets under the common key names are redacted.
 */
export function createPinoLogger(options: PinoLoggerOptions = {}): Logger {
  const instance = pino(
    {
      name: options.name ?? 'tidewatch',
      level: resolveLevel(options.level),
      base: {},
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]'
      }
    },
    options.destination ?? pino.destination(2)
  );

  return adapt(instance);
}
