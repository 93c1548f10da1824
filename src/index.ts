export {
  ConnectionAdmission,
  DEFAULT_MAX_SIMULTANEOUS_CONNECTIONS,
  type Permit,
} from './admission.js';
export {
  config,
  DEFAULT_VALIDATION_TOKEN_FIELD_NAME,
  DEFAULT_VALIDATION_TOKEN_PLACEHOLDER,
  resolveServerOptions,
  serverVersion,
  type ServerOptions,
  type ServerOptionsInput,
  type SessionKeyMode,
} from './config.js';
export {
  AppError,
  ConfigError,
  getErrorMessage,
  isSystemError,
  ListenerClosedError,
  PayloadTooLargeError,
  RequestAbortedError,
  ServerError,
  type ServerErrorKind,
} from './errors.js';
export { discoverLocalIPv4Addresses } from './host.js';
export {
  type BoundAddress,
  type Connection,
  ConnectionListener,
} from './listener.js';
export { logDebug, logError, logInfo, logWarn } from './observability.js';
export { decodeParameters } from './params.js';
export { type AcceptSource, RequestPipeline } from './pipeline.js';
export {
  createTokenPostProcessor,
  ensureValidationToken,
  hasValidToken,
} from './post-process.js';
export { content, errorResponse, html, redirect } from './responses.js';
export { writeResponse } from './response-writer.js';
export { startWebServer, type WebServer } from './server.js';
export {
  createSessionStore,
  Session,
  type SessionStore,
  type SessionValue,
  startSessionSweep,
} from './session.js';
export type {
  ContentResponse,
  Dispatcher,
  ErrorRedirect,
  ParameterMap,
  PostProcess,
  RedirectResponse,
  RequestContext,
  RequestObserver,
  ResponseDescriptor,
} from './types.js';
