import { randomBytes, timingSafeEqual } from 'node:crypto';

import {
  DEFAULT_VALIDATION_TOKEN_FIELD_NAME,
  DEFAULT_VALIDATION_TOKEN_PLACEHOLDER,
} from './config.js';
import type { Session } from './session.js';
import type { ParameterMap, PostProcess } from './types.js';

const TOKEN_BYTES = 32;

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

function escapeAttribute(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Returns the session's anti-forgery token, minting one on first use. */
export function ensureValidationToken(
  session: Session,
  fieldName = DEFAULT_VALIDATION_TOKEN_FIELD_NAME
): string {
  const existing = session.getString(fieldName);
  if (existing) return existing;

  const token = randomBytes(TOKEN_BYTES).toString('base64url');
  session.set(fieldName, token);
  return token;
}

/** True when the submitted parameters carry the session's token. */
export function hasValidToken(
  session: Session,
  parameters: ParameterMap,
  fieldName = DEFAULT_VALIDATION_TOKEN_FIELD_NAME
): boolean {
  const expected = session.getString(fieldName);
  const submitted = parameters.get(fieldName);
  if (!expected || submitted === undefined) return false;

  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(submitted, 'utf8');
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export function renderTokenField(fieldName: string, token: string): string {
  return `<input name='${escapeAttribute(fieldName)}' type='hidden' value='${escapeAttribute(token)}' id='__csrf__'/>`;
}

export interface TokenPostProcessorOptions {
  readonly placeholder?: string;
  readonly fieldName?: string;
}

export function createTokenPostProcessor(
  options: TokenPostProcessorOptions = {}
): PostProcess {
  const placeholder = options.placeholder ?? DEFAULT_VALIDATION_TOKEN_PLACEHOLDER;
  const fieldName = options.fieldName ?? DEFAULT_VALIDATION_TOKEN_FIELD_NAME;

  return (session, html) => {
    if (!html.includes(placeholder)) return html;
    const field = renderTokenField(
      fieldName,
      ensureValidationToken(session, fieldName)
    );
    return html.replaceAll(placeholder, () => field);
  };
}
