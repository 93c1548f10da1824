import { ServerError, type ServerErrorKind } from './errors.js';
import type {
  ContentResponse,
  RedirectResponse,
  ResponseDescriptor,
} from './types.js';

const HTML_CONTENT_TYPE = 'text/html';

export function redirect(location: string): RedirectResponse {
  return { kind: 'redirect', location, error: ServerError.Ok };
}

export function content(
  body: Uint8Array | string,
  contentType: string,
  encoding: BufferEncoding = 'utf8'
): ContentResponse {
  const bytes = typeof body === 'string' ? Buffer.from(body, encoding) : body;
  return {
    kind: 'content',
    body: bytes,
    contentType,
    encoding,
    error: ServerError.Ok,
  };
}

export function html(text: string): ContentResponse {
  return content(text, HTML_CONTENT_TYPE);
}

/** A descriptor whose target is decided later by the configured `onError`. */
export function errorResponse(error: ServerErrorKind): RedirectResponse {
  return { kind: 'redirect', location: '', error };
}

export function isHtmlContent(
  response: ResponseDescriptor
): response is ContentResponse {
  if (response.kind !== 'content') return false;
  const mediaType = response.contentType.split(';', 1)[0]?.trim().toLowerCase();
  return mediaType === HTML_CONTENT_TYPE;
}
