import type { ServerResponse } from 'node:http';

import { serverVersion } from './config.js';
import { resolveRedirectBase } from './host.js';
import type { ContentResponse, ResponseDescriptor } from './types.js';

const REDIRECT_STATUS = 302;
const OK_STATUS = 200;

const CHARSET_NAMES: Readonly<Partial<Record<BufferEncoding, string>>> = {
  utf8: 'utf-8',
  'utf-8': 'utf-8',
  latin1: 'iso-8859-1',
  binary: 'iso-8859-1',
  ascii: 'us-ascii',
  utf16le: 'utf-16le',
  'utf-16le': 'utf-16le',
  ucs2: 'utf-16le',
  'ucs-2': 'utf-16le',
};

const TEXTUAL_TYPE = /^text\/|[/+](json|xml|javascript)\b/i;

export function buildContentType(response: ContentResponse): string {
  const charset = CHARSET_NAMES[response.encoding];
  if (
    !charset ||
    !TEXTUAL_TYPE.test(response.contentType) ||
    /;\s*charset=/i.test(response.contentType)
  ) {
    return response.contentType;
  }
  return `${response.contentType}; charset=${charset}`;
}

export function buildRedirectLocation(
  target: string,
  publicAddress: string,
  hostAddress: string
): string {
  return `${resolveRedirectBase(publicAddress, hostAddress)}${target}`;
}

export interface WriteResponseOptions {
  readonly publicAddress: string;
  /** Local endpoint the request arrived on, as `address:port`. */
  readonly hostAddress: string;
}

/**
 * Writes `descriptor` and ends the response. The stream is ended exactly once,
 * including when writing itself throws.
 */
export function writeResponse(
  res: ServerResponse,
  descriptor: ResponseDescriptor,
  options: WriteResponseOptions
): void {
  try {
    if (res.headersSent) return;
    res.setHeader('Server', `lean-web-core/${serverVersion}`);

    if (descriptor.kind === 'redirect') {
      res.statusCode = REDIRECT_STATUS;
      res.setHeader(
        'Location',
        buildRedirectLocation(
          descriptor.location,
          options.publicAddress,
          options.hostAddress
        )
      );
      res.setHeader('Content-Length', 0);
      return;
    }

    res.statusCode = OK_STATUS;
    res.setHeader('Content-Type', buildContentType(descriptor));
    res.setHeader('Content-Length', descriptor.body.byteLength);
    res.write(descriptor.body);
  } finally {
    if (!res.writableEnded) res.end();
  }
}
