import type { FastifyInstance, LightMyRequestResponse } from 'fastify';
import {
  decodeSessionState,
  encodeSessionState,
  parseConfig,
  type LaunchpadConfig,
  type LaunchpadConfigInput,
  type SessionState,
} from '@launchpad/core';
import { LaunchpadServer } from '../src/server.js';
import type { FetchFn } from '../src/clients/api-client.js';
import {
  fakeSealer,
  MockComputePlatform,
  MockSourceHost,
  type RecordedCall,
} from '../../core/__tests__/fakes.js';

export { methods, repository } from '../../core/__tests__/fakes.js';

export const COOKIE_NAME = '__Secure-Launchpad-State';

export function testConfig(overrides: Partial<LaunchpadConfigInput> = {}): LaunchpadConfig {
  return parseConfig({
    server: { log_level: 'silent' },
    github: { client_id: 'test-client-id', client_secret: 'test-secret' },
    ...overrides,
  });
}

export interface TestHandle {
  fastify: FastifyInstance;
  source: MockSourceHost;
  compute: MockComputePlatform;
  calls: RecordedCall[];
  stop: () => Promise<void>;
}

export async function startTestServer(
  opts: { config?: LaunchpadConfig; fetch?: FetchFn } = {}
): Promise<TestHandle> {
  const calls: RecordedCall[] = [];
  const source = new MockSourceHost(calls);
  const compute = new MockComputePlatform(calls);

  const server = new LaunchpadServer({
    config: opts.config ?? testConfig(),
    source,
    compute,
    sealer: fakeSealer,
    generateName: () => 'brave-otter',
    fetch: opts.fetch,
  });
  await server.initialize();

  return {
    fastify: server.getServer(),
    source,
    compute,
    calls,
    stop: () => server.stop(),
  };
}

/**
 * Cookie header carrying a session state
 */
export function stateCookie(state: SessionState): string {
  return `${COOKIE_NAME}=${encodeSessionState(state)}`;
}

/**
 * Session state the response wrote back, or undefined when it set no cookie
 */
export function responseState(response: LightMyRequestResponse): SessionState | undefined {
  const cookie = response.cookies.find(c => c.name === COOKIE_NAME);
  return cookie ? decodeSessionState(cookie.value) : undefined;
}

export function form(fields: Record<string, string>): { payload: string; headers: Record<string, string> } {
  return {
    payload: new URLSearchParams(fields).toString(),
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
  };
}
