import { createRequire } from 'node:module';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { ConfigError } from './errors.js';
import type {
  Dispatcher,
  ErrorRedirect,
  PostProcess,
  RequestObserver,
} from './types.js';

const require = createRequire(import.meta.url);
const packageJsonPath = fileURLToPath(
  new URL('../package.json', import.meta.url)
);
const packageJson = require(packageJsonPath) as { version?: string };
if (typeof packageJson.version !== 'string') {
  throw new Error('package.json version is missing');
}

export const serverVersion: string = packageJson.version;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const { env } = process;

export function parseIntegerValue(
  envValue: string | undefined,
  min?: number,
  max?: number
): number | null {
  if (!envValue) return null;
  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return null;
  if (min !== undefined && parsed < min) return null;
  if (max !== undefined && parsed > max) return null;
  return parsed;
}

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  return parseIntegerValue(envValue, min, max) ?? defaultValue;
}

export function parseList(envValue: string | undefined): string[] {
  if (!envValue) return [];
  return envValue
    .split(/[\s,]+/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parsePort(envValue: string | undefined): number {
  if (envValue?.trim() === '0') return 0;
  return parseInteger(envValue, DEFAULT_PORT, 1, 65535);
}

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const level = envValue.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function parseLogFormat(envValue: string | undefined): LogFormat {
  return envValue?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

const DEFAULT_PORT = 80;
const DEFAULT_MAX_CONNECTIONS = 20;
const DEFAULT_SESSION_EXPIRATION_SECONDS = 60;
const MIN_SESSION_RETENTION_SECONDS = 600;
const SESSION_RETENTION_FACTOR = 10;
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export const DEFAULT_VALIDATION_TOKEN_PLACEHOLDER = '<%AntiForgeryToken%>';
export const DEFAULT_VALIDATION_TOKEN_FIELD_NAME = '__CSRFToken__';

export const config = {
  server: {
    name: 'lean-web-core',
    version: serverVersion,
    port: parsePort(env.PORT),
    bindAddresses: parseList(env.BIND_ADDRESSES),
    publicAddress: (env.PUBLIC_ADDRESS ?? '').trim(),
    maxSimultaneousConnections: parseInteger(
      env.MAX_CONNECTIONS,
      DEFAULT_MAX_CONNECTIONS,
      1
    ),
    sessionExpirationSeconds: parseInteger(
      env.SESSION_EXPIRATION_SECONDS,
      DEFAULT_SESSION_EXPIRATION_SECONDS,
      1
    ),
    maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
  },
  logging: {
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
  },
};

/* -------------------------------------------------------------------------------------------------
 * Server options
 * ------------------------------------------------------------------------------------------------- */

export type SessionKeyMode = 'address' | 'endpoint';

export interface ServerOptionsInput {
  readonly dispatcher: Dispatcher;
  readonly onError: ErrorRedirect;
  readonly onRequestObserved?: RequestObserver;
  readonly postProcess?: PostProcess;
  readonly maxSimultaneousConnections?: number;
  readonly sessionExpirationSeconds?: number;
  /** How long an idle session is kept before the sweep drops it. */
  readonly sessionRetentionSeconds?: number;
  readonly sessionKey?: SessionKeyMode;
  readonly publicAddress?: string;
  readonly port?: number;
  /** Defaults to `localhost` plus every non-internal IPv4 interface address. */
  readonly bindAddresses?: readonly string[];
  readonly maxBodyBytes?: number;
  readonly requestTimeoutMs?: number;
  readonly validationTokenPlaceholder?: string;
  readonly validationTokenFieldName?: string;
  readonly nowMs?: () => number;
}

export interface ServerOptions {
  readonly dispatcher: Dispatcher;
  readonly onError: ErrorRedirect;
  readonly onRequestObserved: RequestObserver | undefined;
  readonly postProcess: PostProcess | undefined;
  readonly maxSimultaneousConnections: number;
  readonly sessionExpirationSeconds: number;
  readonly sessionRetentionSeconds: number;
  readonly sessionKey: SessionKeyMode;
  readonly publicAddress: string;
  readonly port: number;
  readonly bindAddresses: readonly string[] | undefined;
  readonly maxBodyBytes: number;
  readonly requestTimeoutMs: number | undefined;
  readonly validationTokenPlaceholder: string;
  readonly validationTokenFieldName: string;
  readonly nowMs: () => number;
}

const positiveInt = z.number().int().positive();

const scalarOptionsSchema = z.strictObject({
  maxSimultaneousConnections: positiveInt,
  sessionExpirationSeconds: positiveInt,
  sessionRetentionSeconds: positiveInt.optional(),
  sessionKey: z.enum(['address', 'endpoint']),
  publicAddress: z.string().trim(),
  port: z.number().int().min(0).max(65535),
  bindAddresses: z.array(z.string().trim().min(1)).min(1).optional(),
  maxBodyBytes: positiveInt,
  requestTimeoutMs: z.number().int().min(0).optional(),
  validationTokenPlaceholder: z.string().min(1),
  validationTokenFieldName: z.string().min(1),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function resolveRetentionSeconds(
  explicit: number | undefined,
  ttlSeconds: number
): number {
  const fallback = Math.max(
    ttlSeconds * SESSION_RETENTION_FACTOR,
    MIN_SESSION_RETENTION_SECONDS
  );
  return Math.max(explicit ?? fallback, ttlSeconds);
}

export function resolveServerOptions(input: ServerOptionsInput): ServerOptions {
  if (typeof input.dispatcher?.route !== 'function') {
    throw new ConfigError('dispatcher with a route() function is required');
  }
  if (typeof input.onError !== 'function') {
    throw new ConfigError('onError callback is required');
  }

  const parsed = scalarOptionsSchema.safeParse({
    maxSimultaneousConnections:
      input.maxSimultaneousConnections ??
      config.server.maxSimultaneousConnections,
    sessionExpirationSeconds:
      input.sessionExpirationSeconds ?? config.server.sessionExpirationSeconds,
    sessionRetentionSeconds: input.sessionRetentionSeconds,
    sessionKey: input.sessionKey ?? 'address',
    publicAddress: input.publicAddress ?? config.server.publicAddress,
    port: input.port ?? config.server.port,
    bindAddresses:
      input.bindAddresses ??
      (config.server.bindAddresses.length > 0
        ? config.server.bindAddresses
        : undefined),
    maxBodyBytes: input.maxBodyBytes ?? config.server.maxBodyBytes,
    requestTimeoutMs: input.requestTimeoutMs,
    validationTokenPlaceholder:
      input.validationTokenPlaceholder ?? DEFAULT_VALIDATION_TOKEN_PLACEHOLDER,
    validationTokenFieldName:
      input.validationTokenFieldName ?? DEFAULT_VALIDATION_TOKEN_FIELD_NAME,
  });

  if (!parsed.success) {
    throw new ConfigError(
      `Invalid server options: ${formatIssues(parsed.error)}`
    );
  }

  const scalars = parsed.data;

  return {
    ...scalars,
    dispatcher: input.dispatcher,
    onError: input.onError,
    onRequestObserved: input.onRequestObserved,
    postProcess: input.postProcess,
    sessionRetentionSeconds: resolveRetentionSeconds(
      scalars.sessionRetentionSeconds,
      scalars.sessionExpirationSeconds
    ),
    bindAddresses: scalars.bindAddresses,
    requestTimeoutMs: scalars.requestTimeoutMs,
    nowMs: input.nowMs ?? Date.now,
  };
}
