/**
 * Logger contract for Tidewatch
 *
 * The shape matches pino's call convention (`logger.warn(obj, msg)`), so a pino
 * instance can be handed to any component directly. Core only formats records;
 * writing them somewhere is left to the caller or to the runtime's pino adapter.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogData = {
  [key: string]: unknown;
};

export type Logger = {
  level: string;
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
  child?(bindings: LogData): Logger;
};

/**
 * Log levels with numeric values for comparison
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Check if a log level should be output
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

export type LoggerOptions = {
  level?: LogLevel;
  bindings?: LogData;
  json?: boolean;
  output?: (line: string) => void;
  now?: () => Date;
};

function isLogData(value: unknown): value is LogData {
  return typeof value === 'object' && value !== null;
}

const noopOutput: (line: string) => void = () => {};

function formatRecord(
  level: LogLevel,
  obj: unknown,
  msg: string | undefined,
  bindings: LogData,
  json: boolean,
  time: Date
): string {
  const message = msg ?? (typeof obj === 'string' ? obj : undefined);
  const data = isLogData(obj) ? obj : undefined;

  if (json) {
    const record: LogData = { time: time.toISOString(), level, ...bindings, ...data };
    if (message !== undefined) {
      record.msg = message;
    }
    return JSON.stringify(record);
  }

  const fields = { ...bindings, ...data };
  const fieldStr = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
  return `[${time.toISOString()}] [${level.toUpperCase()}] ${message ?? ''}${fieldStr}`;
}

/**
 * Create a functional logger that formats records and hands them to `output`
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const bindings = options.bindings ?? {};
  const json = options.json ?? false;
  const output = options.output ?? noopOutput;
  const now = options.now ?? (() => new Date());

  const log = (messageLevel: LogLevel, obj: unknown, msg?: string): void => {
    if (!shouldLog(level, messageLevel)) {
      return;
    }
    output(formatRecord(messageLevel, obj, msg, bindings, json, now()));
  };

  return {
    level,
    error: (obj, msg) => log('error', obj, msg),
    warn: (obj, msg) => log('warn', obj, msg),
    info: (obj, msg) => log('info', obj, msg),
    debug: (obj, msg) => log('debug', obj, msg),
    trace: (obj, msg) => log('trace', obj, msg),
    child: (childBindings) =>
      createLogger({ ...options, bindings: { ...bindings, ...childBindings } })
  };
}

/**
 * Logger that drops everything. Default for components constructed without one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
