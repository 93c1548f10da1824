import { logDebug } from './observability.js';

interface HttpServerTuningTarget {
  requestTimeout?: number;
  closeIdleConnections?: () => void;
}

export interface HttpServerTuning {
  readonly requestTimeoutMs: number | undefined;
}

function setIfDefined<T>(
  value: T | undefined,
  setter: (resolved: T) => void
): void {
  if (value === undefined) return;
  setter(value);
}

export function applyHttpServerTuning(
  server: HttpServerTuningTarget,
  tuning: HttpServerTuning
): void {
  setIfDefined(tuning.requestTimeoutMs, (value) => {
    server.requestTimeout = value;
  });
}

export function drainConnectionsOnShutdown(
  server: HttpServerTuningTarget
): void {
  if (typeof server.closeIdleConnections === 'function') {
    server.closeIdleConnections();
    logDebug('Closed idle HTTP connections during shutdown');
  }
}
