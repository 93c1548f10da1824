import type { IncomingMessage } from 'node:http';

import type { ServerErrorKind } from './errors.js';
import type { Session } from './session.js';

/** Decoded query-string and body parameters, in insertion order. */
export type ParameterMap = Map<string, string>;

export interface RequestContext {
  readonly requestId: string;
  readonly verb: string;
  /** Raw URL up to the first `?`. */
  readonly path: string;
  /** Raw URL after the first `?`, without the `?`. */
  readonly query: string;
  readonly parameters: ParameterMap;
  readonly clientAddress: string;
  readonly clientKey: string;
  /** Local endpoint the request arrived on, as `address:port`. */
  readonly hostAddress: string;
}

interface ResponseBase {
  readonly error: ServerErrorKind;
}

export interface RedirectResponse extends ResponseBase {
  readonly kind: 'redirect';
  /** Target path, made absolute by the response writer. */
  readonly location: string;
}

export interface ContentResponse extends ResponseBase {
  readonly kind: 'content';
  readonly body: Uint8Array;
  readonly contentType: string;
  readonly encoding: BufferEncoding;
}

export type ResponseDescriptor = RedirectResponse | ContentResponse;

export interface Dispatcher {
  route(
    session: Session,
    verb: string,
    path: string,
    parameters: ParameterMap
  ): ResponseDescriptor | Promise<ResponseDescriptor>;
}

export type ErrorRedirect = (error: ServerErrorKind) => string;

export type RequestObserver = (
  session: Session,
  request: IncomingMessage
) => void | Promise<void>;

export type PostProcess = (session: Session, html: string) => string;
