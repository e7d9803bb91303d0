/**
 * Error classification
 *
 * Maps whatever a fetch collaborator throws into a ClassifiedFailure. Total:
 * every input yields exactly one kind and nothing here throws.
 */

import {
  type ClassifiedFailure,
  createFailure,
  ErrorKind,
  isClassifiedFailure
} from '@tidewatch/core';
import { ZodError } from 'zod';

/**
 * Thrown by a fetch collaborator when the remote job reports a failure of its own
 */
export class DomainFailureError extends Error {
  public readonly payload: unknown;

  constructor(message: string, payload?: unknown) {
    super(message);
    this.name = 'DomainFailureError';
    this.payload = payload;
  }
}

/**
 * Thrown by a fetch collaborator when a payload is malformed or unexpected
 */
export class InvalidDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidDataError';
  }
}

export type ClassifyOptions = {
  /** Treat domainFailure as retryable (default false) */
  retryDomainFailures?: boolean;
  /** Treat unknown failures as retryable (default false) */
  retryUnknown?: boolean;
  now?: () => number;
};

const NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ECONNABORTED',
  'UND_ERR_SOCKET'
]);

const TIMEOUT_CODES: ReadonlySet<string> = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

const UNDICI_TIMEOUT = /^UND_ERR_[A-Z_]*TIMEOUT$/;

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function readString(value: unknown, key: string): string | undefined {
  const property = readProperty(value, key);
  return typeof property === 'string' ? property : undefined;
}

function readStatus(raw: unknown): number | undefined {
  const candidates = [
    readProperty(raw, 'status'),
    readProperty(raw, 'statusCode'),
    readProperty(readProperty(raw, 'response'), 'status')
  ];
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isInteger(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

function readHeader(headers: unknown, name: string): unknown {
  const get = readProperty(headers, 'get');
  if (typeof get === 'function') {
    return Reflect.apply(get, headers, [name]);
  }
  return readProperty(headers, name);
}

/**
 * Server-requested wait in ms: a `retryAfter` property in seconds, or a
 * Retry-After header (delay-seconds or HTTP date) on the error or its response
 */
function readRetryAfter(raw: unknown, now: number): number | undefined {
  const seconds = readProperty(raw, 'retryAfter');
  if (typeof seconds === 'number' && Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const header =
    readHeader(readProperty(raw, 'headers'), 'retry-after') ??
    readHeader(readProperty(readProperty(raw, 'response'), 'headers'), 'retry-after');
  if (typeof header === 'number' && header >= 0) {
    return header * 1000;
  }
  if (typeof header !== 'string') {
    return undefined;
  }

  const value = header.trim();
  if (/^\d+$/.test(value)) {
    return Number(value) * 1000;
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Error codes of the raw value and of its cause (fetch wraps socket errors)
 */
function readCodes(raw: unknown): string[] {
  return [readString(raw, 'code'), readString(readProperty(raw, 'cause'), 'code')].filter(
    (code): code is string => code !== undefined
  );
}

function describeFailure(raw: unknown): string {
  if (raw instanceof Error) {
    return raw.message || raw.name;
  }
  const message = readString(raw, 'message');
  if (message !== undefined) {
    return message;
  }
  try {
    return typeof raw === 'string' ? raw : (JSON.stringify(raw) ?? String(raw));
  } catch {
    return String(raw);
  }
}

function isTimeout(raw: unknown, codes: string[], status: number | undefined): boolean {
  const name = readString(raw, 'name');
  if (name === 'TimeoutError' || name === 'AbortError') {
    return true;
  }
  if (codes.some((code) => TIMEOUT_CODES.has(code) || UNDICI_TIMEOUT.test(code))) {
    return true;
  }
  return status === 408;
}

function isNetwork(raw: unknown, codes: string[]): boolean {
  if (codes.some((code) => NETWORK_CODES.has(code))) {
    return true;
  }
  return raw instanceof TypeError && raw.message === 'fetch failed';
}

function kindOf(raw: unknown): { kind: ErrorKind; statusCode?: number } {
  if (raw instanceof DomainFailureError) {
    return { kind: ErrorKind.DOMAIN_FAILURE };
  }
  if (raw instanceof InvalidDataError || raw instanceof SyntaxError || raw instanceof ZodError) {
    return { kind: ErrorKind.INVALID_DATA };
  }

  const status = readStatus(raw);
  const codes = readCodes(raw);

  if (isTimeout(raw, codes, status)) {
    return { kind: ErrorKind.TIMEOUT, statusCode: status };
  }
  if (isNetwork(raw, codes)) {
    return { kind: ErrorKind.NETWORK };
  }
  if (status !== undefined) {
    if (status === 429 || (status >= 500 && status <= 599)) {
      return { kind: ErrorKind.SERVER_UNAVAILABLE, statusCode: status };
    }
    if (status >= 400 && status <= 499) {
      return { kind: ErrorKind.CLIENT_REJECTED, statusCode: status };
    }
  }
  return { kind: ErrorKind.UNKNOWN, statusCode: status };
}

export function isRetryableKind(kind: ErrorKind, options: ClassifyOptions = {}): boolean {
  switch (kind) {
    case ErrorKind.NETWORK:
    case ErrorKind.TIMEOUT:
    case ErrorKind.SERVER_UNAVAILABLE:
      return true;
    case ErrorKind.CLIENT_REJECTED:
    case ErrorKind.INVALID_DATA:
      return false;
    case ErrorKind.DOMAIN_FAILURE:
      return options.retryDomainFailures ?? false;
    case ErrorKind.UNKNOWN:
      return options.retryUnknown ?? false;
  }
}

/**
 * Classify a raw failure. Already-classified failures pass through unchanged.
 */
export function classify(raw: unknown, options: ClassifyOptions = {}): ClassifiedFailure {
  if (isClassifiedFailure(raw)) {
    return raw;
  }

  const { kind, statusCode } = kindOf(raw);
  const occurredAt = (options.now ?? Date.now)();
  return createFailure(kind, {
    retryable: isRetryableKind(kind, options),
    message: describeFailure(raw),
    cause: raw,
    statusCode,
    retryAfter:
      kind === ErrorKind.SERVER_UNAVAILABLE ? readRetryAfter(raw, occurredAt) : undefined,
    occurredAt
  });
}
