import type { ParameterMap } from './types.js';

function decodeComponent(raw: string): string {
  const spaced = raw.replaceAll('+', ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    // Malformed escape: keep the text as sent.
    return spaced;
  }
}

/**
 * Decodes `key=value&key=value` into `into` (or a new map). A segment without
 * `=` becomes a key with an empty value; a later duplicate key overwrites the
 * earlier value. Never throws.
 *
 * Example: `username=abc&password=123`
 */
export function decodeParameters(
  raw: string,
  into: ParameterMap = new Map()
): ParameterMap {
  if (raw.length === 0) return into;

  for (const segment of raw.split('&')) {
    if (segment.length === 0) continue;

    const separator = segment.indexOf('=');
    const rawKey = separator === -1 ? segment : segment.slice(0, separator);
    const rawValue = separator === -1 ? '' : segment.slice(separator + 1);

    into.set(decodeComponent(rawKey), decodeComponent(rawValue));
  }

  return into;
}

/** Splits a raw request URL at the first `?`. */
export function splitRawUrl(rawUrl: string): { path: string; query: string } {
  const separator = rawUrl.indexOf('?');
  if (separator === -1) return { path: rawUrl, query: '' };
  return {
    path: rawUrl.slice(0, separator),
    query: rawUrl.slice(separator + 1),
  };
}
