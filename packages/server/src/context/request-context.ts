/**
 * Per-request session context
 *
 * Decodes the state cookie once at the start of a handler and writes it back
 * only when a transition changed it. Concurrent requests from one browser each
 * work on their own copy; the last response to set the cookie wins.
 */

import type { CookieSerializeOptions } from '@fastify/cookie';
import { decodeSessionState, encodeSessionState, type SessionState } from '@launchpad/core';
import type { FastifyReply, FastifyRequest } from 'fastify';

export const STATE_COOKIE_OPTIONS: CookieSerializeOptions = {
  path: '/',
  secure: true,
  httpOnly: true,
  sameSite: 'lax',
};

export class RequestContext {
  private dirty = false;

  private constructor(
    private current: SessionState,
    private readonly cookieName: string
  ) {}

  static fromRequest(request: FastifyRequest, cookieName: string): RequestContext {
    return new RequestContext(decodeSessionState(request.cookies[cookieName]), cookieName);
  }

  get state(): SessionState {
    return this.current;
  }

  get changed(): boolean {
    return this.dirty;
  }

  update(next: SessionState): void {
    if (next !== this.current) {
      this.current = next;
      this.dirty = true;
    }
  }

  commit(reply: FastifyReply): void {
    if (this.dirty) {
      reply.setCookie(this.cookieName, encodeSessionState(this.current), STATE_COOKIE_OPTIONS);
    }
  }
}
