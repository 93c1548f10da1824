import { randomUUID } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import { TextDecoder } from 'node:util';

import type { Permit } from './admission.js';
import type { ServerOptions } from './config.js';
import {
  getErrorMessage,
  isServerErrorKind,
  PayloadTooLargeError,
  RequestAbortedError,
  ServerError,
  type ServerErrorKind,
  toError,
} from './errors.js';
import { formatEndpoint } from './host.js';
import type { Connection } from './listener.js';
import {
  logDebug,
  logError,
  logInfo,
  logWarn,
  redactParameter,
  runWithLogContext,
} from './observability.js';
import { decodeParameters, splitRawUrl } from './params.js';
import { createTokenPostProcessor } from './post-process.js';
import { content, isHtmlContent } from './responses.js';
import { writeResponse } from './response-writer.js';
import type { Session, SessionStore } from './session.js';
import { isObject } from './type-guards.js';
import type {
  PostProcess,
  RedirectResponse,
  RequestContext,
  ResponseDescriptor,
} from './types.js';

/** Source of inbound connections; `ConnectionListener` in production. */
export interface AcceptSource {
  accept(): Promise<Connection>;
}

export type PipelineState =
  | 'accepted'
  | 'parsed'
  | 'session-resolved'
  | 'dispatched'
  | 'responded'
  | 'released';

type DispatchOutcome =
  | { readonly ok: true; readonly response: ResponseDescriptor }
  | { readonly ok: false; readonly error: unknown };

interface ConnectionInfo {
  readonly requestId: string;
  readonly clientAddress: string;
  readonly clientKey: string;
  readonly hostAddress: string;
}

/* -------------------------------------------------------------------------------------------------
 * Request parsing helpers
 * ------------------------------------------------------------------------------------------------- */

const DEFAULT_BODY_CHARSET = 'utf-8';

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    // A request dropped while queued is destroyed without emitting anything.
    if (req.destroyed || req.readableAborted) {
      reject(new RequestAbortedError());
      return;
    }

    let size = 0;
    const chunks: Buffer[] = [];

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        // Keep draining so the redirect can still be written.
        req.removeAllListeners('data');
        req.resume();
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      resolve(Buffer.concat(chunks));
    });

    req.on('error', (err) => {
      reject(toError(err));
    });

    req.on('close', () => {
      if (!req.complete) reject(new RequestAbortedError());
    });
  });
}

export function resolveBodyCharset(contentType: string | undefined): string {
  const match = contentType?.match(/;\s*charset=("?)([^";\s]+)\1/i);
  return match?.[2]?.toLowerCase() ?? DEFAULT_BODY_CHARSET;
}

export function decodeBody(body: Buffer, charset: string): string {
  if (body.length === 0) return '';
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder(DEFAULT_BODY_CHARSET);
  }
  return decoder.decode(body);
}

function describeConnection(
  req: IncomingMessage,
  options: ServerOptions
): ConnectionInfo {
  const { socket } = req;
  const clientAddress = formatEndpoint(socket.remoteAddress, undefined);
  return {
    requestId: randomUUID(),
    clientAddress,
    clientKey:
      options.sessionKey === 'endpoint'
        ? formatEndpoint(socket.remoteAddress, socket.remotePort)
        : clientAddress,
    hostAddress: formatEndpoint(socket.localAddress, socket.localPort),
  };
}

function isResponseDescriptor(value: unknown): value is ResponseDescriptor {
  if (!isObject(value)) return false;
  if (!isServerErrorKind(value['error'])) return false;
  if (value['kind'] === 'redirect') return typeof value['location'] === 'string';
  return value['kind'] === 'content' && value['body'] instanceof Uint8Array;
}

/* -------------------------------------------------------------------------------------------------
 * Request pipeline
 * ------------------------------------------------------------------------------------------------- */

export interface RequestPipelineDeps {
  readonly options: ServerOptions;
  readonly sessions: SessionStore;
  readonly source: AcceptSource;
}

/**
 * One request-handling life: await a connection while holding an admission
 * permit, hand the permit back as soon as a connection arrives, then parse,
 * resolve the session, dispatch and respond. Every failure after the accept
 * ends as a redirect; only accept failures propagate.
 */
export class RequestPipeline {
  private readonly options: ServerOptions;
  private readonly sessions: SessionStore;
  private readonly source: AcceptSource;
  private readonly postProcess: PostProcess;

  constructor(deps: RequestPipelineDeps) {
    this.options = deps.options;
    this.sessions = deps.sessions;
    this.source = deps.source;
    this.postProcess =
      deps.options.postProcess ??
      createTokenPostProcessor({
        placeholder: deps.options.validationTokenPlaceholder,
        fieldName: deps.options.validationTokenFieldName,
      });
  }

  async serve(permit: Permit): Promise<void> {
    let connection: Connection;
    try {
      connection = await this.source.accept();
    } finally {
      permit.release();
    }
    await this.handle(connection);
  }

  async handle({ request, response }: Connection): Promise<void> {
    const info = describeConnection(request, this.options);

    await runWithLogContext(
      { requestId: info.requestId, clientKey: info.clientKey },
      async () => {
        trace('accepted');
        const { path } = splitRawUrl(request.url ?? '/');
        logInfo(`${info.clientAddress} ${request.method ?? 'GET'} ${path}`);

        let descriptor: ResponseDescriptor;
        try {
          descriptor = await this.process(request, info);
        } catch (error) {
          if (error instanceof RequestAbortedError) {
            logWarn('Client disconnected before the request was read');
            response.destroy();
            trace('released');
            return;
          }
          logError('Request processing failed', toError(error));
          descriptor = this.errorRedirect(ServerError.ServerError);
        }

        try {
          writeResponse(response, descriptor, {
            publicAddress: this.options.publicAddress,
            hostAddress: info.hostAddress,
          });
          trace('responded');
        } catch (error) {
          logError('Failed to write response', toError(error));
        } finally {
          if (!response.writableEnded) response.destroy();
          trace('released');
        }
      }
    );
  }

  private async process(
    request: IncomingMessage,
    info: ConnectionInfo
  ): Promise<ResponseDescriptor> {
    // No remote address means the socket is already gone; nothing can answer it.
    if (info.clientAddress.length === 0) throw new RequestAbortedError();

    const context = await this.parse(request, info);
    trace('parsed');

    const session = this.sessions.resolve(context.clientKey);
    await this.observe(session, request);
    trace('session-resolved');

    const outcome = await this.invokeDispatcher(session, context);
    trace('dispatched');

    if (!outcome.ok) {
      logError('Dispatcher failed', toError(outcome.error));
      return this.errorRedirect(ServerError.ServerError);
    }

    // After routing, so the dispatcher's expiry check saw the previous request.
    this.sessions.touch(session);

    const { response } = outcome;
    if (response.error !== ServerError.Ok) {
      return this.errorRedirect(response.error);
    }
    return this.applyPostProcess(session, response);
  }

  private async parse(
    request: IncomingMessage,
    info: ConnectionInfo
  ): Promise<RequestContext> {
    const { path, query } = splitRawUrl(request.url ?? '/');
    const parameters = decodeParameters(query);

    const body = await readBody(request, this.options.maxBodyBytes);
    const charset = resolveBodyCharset(request.headers['content-type']);
    decodeParameters(decodeBody(body, charset), parameters);

    for (const [key, value] of parameters) {
      logDebug(`${key} : ${redactParameter(key, value)}`);
    }

    return {
      requestId: info.requestId,
      verb: request.method ?? 'GET',
      path,
      query,
      parameters,
      clientAddress: info.clientAddress,
      clientKey: info.clientKey,
      hostAddress: info.hostAddress,
    };
  }

  private async observe(
    session: Session,
    request: IncomingMessage
  ): Promise<void> {
    const observer = this.options.onRequestObserved;
    if (!observer) return;
    try {
      await observer(session, request);
    } catch (error) {
      logWarn('Request observer failed', { error: getErrorMessage(error) });
    }
  }

  private async invokeDispatcher(
    session: Session,
    context: RequestContext
  ): Promise<DispatchOutcome> {
    try {
      const response: unknown = await this.options.dispatcher.route(
        session,
        context.verb,
        context.path,
        context.parameters
      );
      if (!isResponseDescriptor(response)) {
        return {
          ok: false,
          error: new Error('Dispatcher returned an invalid response descriptor'),
        };
      }
      return { ok: true, response };
    } catch (error) {
      return { ok: false, error };
    }
  }

  private applyPostProcess(
    session: Session,
    response: ResponseDescriptor
  ): ResponseDescriptor {
    if (!isHtmlContent(response)) return response;

    const text = Buffer.from(response.body).toString(response.encoding);
    const processed = this.postProcess(session, text);
    if (processed === text) return response;

    return {
      ...content(processed, response.contentType, response.encoding),
      error: response.error,
    };
  }

  private errorRedirect(error: ServerErrorKind): RedirectResponse {
    return { kind: 'redirect', location: this.resolveErrorTarget(error), error };
  }

  private resolveErrorTarget(error: ServerErrorKind): string {
    try {
      return this.options.onError(error);
    } catch (callbackError) {
      logError('onError callback failed', {
        kind: error,
        error: getErrorMessage(callbackError),
      });
      return '/';
    }
  }
}

function trace(state: PipelineState): void {
  logDebug('Request state', { state });
}
