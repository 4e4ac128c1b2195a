/**
 * Session state codec
 *
 * JSON, then base64url so the value is safe inside a cookie. Decoding never
 * fails: anything that is not a well-formed state becomes the empty state.
 * There is no signature; the browser can rewrite any field.
 */

import { emptySessionState, SessionStateSchema, type SessionState } from './state.js';

export const DEFAULT_STATE_COOKIE = '__Secure-Launchpad-State';

export function encodeSessionState(state: SessionState): string {
  return Buffer.from(JSON.stringify(state), 'utf8').toString('base64url');
}

export function decodeSessionState(token: string | undefined | null): SessionState {
  if (!token) {
    return emptySessionState();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    return emptySessionState();
  }

  const result = SessionStateSchema.safeParse(raw);
  return result.success ? result.data : emptySessionState();
}
