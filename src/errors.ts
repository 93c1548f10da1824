import { inspect } from 'node:util';

import { isError, isObject } from './type-guards.js';

/**
 * Fixed classification carried by every response descriptor. Anything other
 * than `ok` is turned into a redirect through the configured `onError`.
 */
export const ServerError = {
  Ok: 'ok',
  ExpiredSession: 'expired-session',
  NotAuthorized: 'not-authorized',
  FileNotFound: 'file-not-found',
  PageNotFound: 'page-not-found',
  ServerError: 'server-error',
  UnknownType: 'unknown-type',
  ValidationError: 'validation-error',
} as const;

export type ServerErrorKind = (typeof ServerError)[keyof typeof ServerError];

const SERVER_ERROR_KINDS: ReadonlySet<string> = new Set(
  Object.values(ServerError)
);

export function isServerErrorKind(value: unknown): value is ServerErrorKind {
  return typeof value === 'string' && SERVER_ERROR_KINDS.has(value);
}

export class ConfigError extends Error {
  override name = 'ConfigError';
}

export class AppError extends Error {
  readonly code: string;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    code: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.details = Object.freeze({ ...details });
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ListenerClosedError extends AppError {
  constructor() {
    super('Listener is closed', 'LISTENER_CLOSED');
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`, 'PAYLOAD_TOO_LARGE', {
      limit,
    });
  }
}

/** The client went away before its request could be read. */
export class RequestAbortedError extends AppError {
  constructor() {
    super('Request aborted by client', 'REQUEST_ABORTED');
  }
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (isNonEmptyString(error)) return error;
  if (isErrorWithMessage(error)) return error.message;
  return formatUnknownError(error);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isErrorWithMessage(error: unknown): error is { message: string } {
  if (!isObject(error)) return false;
  const { message } = error;
  return isNonEmptyString(message);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  try {
    return inspect(error, {
      depth: 2,
      maxStringLength: 200,
      breakLength: Infinity,
      compact: true,
      colors: false,
    });
  } catch {
    return 'Unknown error';
  }
}

export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(getErrorMessage(error));
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return isError(error) && 'code' in error && typeof error.code === 'string';
}
