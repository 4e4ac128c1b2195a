/**
 * Route tests
 *
 * Drives the wizard through fastify.inject with in-process GitHub and Fastly
 * stand-ins. State travels in the cookie exactly as a browser would carry it.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { deployStatusResponseSchema } from '@launchpad/contracts';
import type { SessionState } from '@launchpad/core';
import {
  form,
  methods,
  repository,
  responseState,
  startTestServer,
  stateCookie,
  testConfig,
  type TestHandle,
} from './helpers.js';

const SOURCE = 'octo-org/starter';
const DEST = 'octo-user/starter';

const FASTLY_TOML = `name = "starter"
language = "rust"

[setup]

[[setup.dictionaries]]
name = "settings"

[[setup.dictionaries.items]]
key = "greeting"
input_type = "string"
value = "hello"

[[setup.dictionaries.items]]
key = "api_key"
input_type = "password"
prompt = "API key"
`;

const SIGNED_IN = { github: 'gh-test-token', fastly: 'test-secret' };

const FORKED: SessionState = {
  login: SIGNED_IN,
  deployment: { src: SOURCE, dest: DEST },
};

const PROVISIONED: SessionState = {
  login: SIGNED_IN,
  deployment: { src: SOURCE, dest: DEST, serviceId: 'svc-1', domain: 'brave-otter.edgecompute.app' },
};

function seed(handle: TestHandle): void {
  handle.source.repositories.set(
    SOURCE,
    repository(SOURCE, { is_template: true, description: 'Edge starter kit', stargazers_count: 12 })
  );
  handle.source.repositories.set('octo-org/plain', repository('octo-org/plain'));
  handle.source.users.set('gh-test-token', { login: 'octo-user' });
  handle.compute.users.set('test-secret', { name: 'Octo User', customer_id: 'cust-1' });
  handle.source.setFile(SOURCE, 'fastly.toml', FASTLY_TOML);
  handle.source.setFile(DEST, 'fastly.toml', FASTLY_TOML);
}

describe('routes', () => {
  let handle: TestHandle;

  beforeEach(async () => {
    handle = await startTestServer();
    seed(handle);
  });

  afterEach(async () => {
    await handle.stop();
  });

  // ==========================================================================
  // Pages
  // ==========================================================================

  describe('pages', () => {
    it('reports health', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/health' });
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });

    it('renders the landing page', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/' });
      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('<h1>Deploy to Fastly Compute</h1>');
    });

    it('renders a deploy button for the requested repository', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/?repository=octo-org/starter' });
      expect(response.body).toContain('<a class="button" href="/octo-org/starter">Deploy octo-org/starter</a>');
    });

    it('records the source repository when its page is viewed', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: `/${SOURCE}` });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('<h1>octo-org/starter</h1>');
      expect(response.body).toContain('Edge starter kit');
      expect(response.body).toContain('href="/oauth/github"');
      expect(responseState(response)).toEqual({ login: {}, deployment: { src: SOURCE } });
    });

    it('forgets a fork recorded for another repository', async () => {
      const other: SessionState = {
        login: SIGNED_IN,
        deployment: { src: 'octo-org/other', dest: 'octo-user/other' },
      };
      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/${SOURCE}`,
        headers: { cookie: stateCookie(other) },
      });

      expect(responseState(response)).toEqual({ login: SIGNED_IN, deployment: { src: SOURCE } });
      expect(response.body).toContain('<button type="submit">Copy to my account</button>');
    });

    it('shows the signed-in identities and the deploy form after a fork', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/${SOURCE}`,
        headers: { cookie: stateCookie(FORKED) },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('GitHub: signed in as <strong>octo-user</strong>');
      expect(response.body).toContain('Fastly: signed in as <strong>Octo User</strong>');
      expect(response.body).toContain('name="dict.settings.api_key" type="password" value="" required');
      expect(response.body).toContain('name="dict.settings.greeting" type="text" value="hello"');
      // Unchanged state is not written back
      expect(responseState(response)).toBeUndefined();
    });

    it('calls GitHub and Fastly one request at a time', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const slow = <A extends unknown[], R>(fn: (...args: A) => Promise<R>) =>
        async (...args: A): Promise<R> => {
          inFlight++;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await new Promise(resolve => setTimeout(resolve, 5));
          try {
            return await fn(...args);
          } finally {
            inFlight--;
          }
        };
      const { source, compute } = handle;
      source.fetchRepository = slow(source.fetchRepository.bind(source));
      source.fetchUser = slow(source.fetchUser.bind(source));
      source.getFile = slow(source.getFile.bind(source));
      compute.fetchUser = slow(compute.fetchUser.bind(compute));

      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/${SOURCE}`,
        headers: { cookie: stateCookie(FORKED) },
      });

      expect(response.statusCode).toBe(200);
      expect(maxInFlight).toBe(1);
      expect(methods(handle.calls)).toEqual([
        'github.fetchRepository',
        'github.fetchUser',
        'fastly.fetchUser',
        'github.getFile',
      ]);
    });

    it('answers 404 for an unknown repository', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/octo-org/missing' });
      expect(response.statusCode).toBe(404);
      expect(response.body).toContain('No repository was found at github.com/octo-org/missing');
    });

    it('answers 404 for an unknown path', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/a/b/c' });
      expect(response.statusCode).toBe(404);
      expect(response.body).toContain('The page you requested could not be found');
    });

    it('serves the stylesheet', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/style.css' });
      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/css');
    });

    it('sets security headers', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/' });
      expect(response.headers['x-frame-options']).toBe('DENY');
      expect(response.headers['x-content-type-options']).toBe('nosniff');
      expect(response.headers['cache-control']).toBe('no-store');
      expect(response.headers['content-security-policy']).toContain("default-src 'none'");
    });
  });

  // ==========================================================================
  // POST /fork
  // ==========================================================================

  describe('POST /fork', () => {
    it('requires a GitHub sign-in', async () => {
      const response = await handle.fastify.inject({ method: 'POST', url: '/fork', ...form({ repository: SOURCE }) });
      expect(response.statusCode).toBe(401);
      expect(response.body).toContain('Sign in to GitHub before forking');
    });

    it('creates a repository from the template and records it', async () => {
      const request = form({ repository: SOURCE });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/fork',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie({ login: SIGNED_IN, deployment: { src: SOURCE } }) },
      });

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe(`/${SOURCE}`);
      expect(responseState(response)).toEqual(FORKED);

      const call = handle.calls.find(c => c.method === 'github.generateFromTemplate');
      expect(call?.args).toEqual(['gh-test-token', SOURCE, 'starter']);
    });

    it('refuses a repository that is not a template', async () => {
      const request = form({ repository: 'octo-org/plain' });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/fork',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie({ login: SIGNED_IN, deployment: {} }) },
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain(
        'Repository octo-org/plain is not a template repository, so it cannot be deployed from'
      );
      expect(methods(handle.calls)).not.toContain('github.forkRepository');
    });

    it('rejects a malformed repository name', async () => {
      const request = form({ repository: 'no-slash' });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/fork',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie({ login: SIGNED_IN, deployment: {} }) },
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain('Invalid request: repository: must be owner/name');
    });
  });

  // ==========================================================================
  // POST /deploy
  // ==========================================================================

  describe('POST /deploy', () => {
    it('provisions the service and records it', async () => {
      const request = form({ repository: SOURCE, 'dict.settings.api_key': 'test-api-key' });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/deploy',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie(FORKED) },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('<h1>Service svc-1 created</h1>');
      expect(response.body).toContain('href="https://brave-otter.edgecompute.app"');
      expect(response.body).toContain('href="https://github.com/octo-user/starter/actions"');
      expect(responseState(response)).toEqual(PROVISIONED);

      const items = handle.calls.find(c => c.method === 'fastly.updateDictionaryItems');
      expect(items?.args[3]).toEqual([
        { op: 'create', item_key: 'greeting', item_value: 'hello' },
        { op: 'create', item_key: 'api_key', item_value: 'test-api-key' },
      ]);

      expect(handle.source.fileAt(DEST, 'fastly.toml')?.content).toBe(
        FASTLY_TOML.replace('language = "rust"\n', 'language = "rust"\nservice_id = "svc-1"\n')
      );
    });

    it('requires a fork of the submitted repository', async () => {
      const request = form({ repository: SOURCE });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/deploy',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie({ login: SIGNED_IN, deployment: { src: SOURCE } }) },
      });

      expect(response.statusCode).toBe(409);
      expect(response.body).toContain('Fork octo-org/starter before deploying it');
      expect(handle.calls).toEqual([]);
    });

    it('requires a Fastly sign-in', async () => {
      const request = form({ repository: SOURCE });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/deploy',
        payload: request.payload,
        headers: {
          ...request.headers,
          cookie: stateCookie({ login: { github: 'gh-test-token' }, deployment: FORKED.deployment }),
        },
      });

      expect(response.statusCode).toBe(401);
      expect(response.body).toContain('Sign in to Fastly before deploying');
    });

    it('reports a missing dictionary value and records nothing', async () => {
      const request = form({ repository: SOURCE });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/deploy',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie(FORKED) },
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain('No value provided for dictionary key api_key');
      expect(responseState(response)).toBeUndefined();
    });

    it('refuses to provision twice', async () => {
      const request = form({ repository: SOURCE, 'dict.settings.api_key': 'test-api-key' });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/deploy',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie(PROVISIONED) },
      });

      expect(response.statusCode).toBe(409);
      expect(methods(handle.calls)).not.toContain('fastly.createService');
    });

    it('rejects an invalid service name', async () => {
      const request = form({ repository: SOURCE, service_name: 'Not A Slug' });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/deploy',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie(FORKED) },
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toContain('service_name: must be lowercase words joined by hyphens');
    });
  });

  // ==========================================================================
  // Status and resets
  // ==========================================================================

  describe('GET /deploy/status', () => {
    it('reports an inactive service without touching the cookie', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/deploy/status',
        headers: { cookie: stateCookie(PROVISIONED) },
      });

      expect(response.statusCode).toBe(200);
      expect(deployStatusResponseSchema.parse(response.json())).toEqual({
        ok: true,
        data: { service_id: 'svc-1', active: false },
      });
      expect(responseState(response)).toBeUndefined();
    });

    it('resets the deployment once the service is active', async () => {
      handle.compute.active = true;
      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/deploy/status',
        headers: { cookie: stateCookie(PROVISIONED) },
      });

      expect(response.json()).toEqual({ ok: true, data: { service_id: 'svc-1', active: true } });
      expect(responseState(response)).toEqual({ login: SIGNED_IN, deployment: {} });
    });

    it('answers with an error envelope before provisioning', async () => {
      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/deploy/status',
        headers: { cookie: stateCookie(FORKED) },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toEqual({
        ok: false,
        error: { code: 'PRECONDITION_FAILED', message: 'No service has been provisioned yet' },
      });
    });
  });

  describe('resets', () => {
    it('clears the deployment and returns to the source', async () => {
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/deploy/reset',
        headers: { cookie: stateCookie(PROVISIONED) },
      });

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe(`/${SOURCE}`);
      expect(responseState(response)).toEqual({ login: SIGNED_IN, deployment: {} });
    });

    it('clears the sign-ins and keeps the deployment', async () => {
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/auth/reset',
        headers: { cookie: stateCookie(FORKED) },
      });

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe(`/${SOURCE}`);
      expect(responseState(response)).toEqual({ login: {}, deployment: FORKED.deployment });
    });

    it('answers concurrent requests independently; the last cookie written wins', async () => {
      const cookie = stateCookie(PROVISIONED);
      const [deployReset, authReset] = await Promise.all([
        handle.fastify.inject({ method: 'POST', url: '/deploy/reset', headers: { cookie } }),
        handle.fastify.inject({ method: 'POST', url: '/auth/reset', headers: { cookie } }),
      ]);

      // Each response carries only its own transition; nothing is merged
      expect(responseState(deployReset)).toEqual({ login: SIGNED_IN, deployment: {} });
      expect(responseState(authReset)).toEqual({ login: {}, deployment: PROVISIONED.deployment });
    });
  });

  // ==========================================================================
  // OAuth and token sign-in
  // ==========================================================================

  describe('sign-in', () => {
    it('redirects to the GitHub consent page', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/oauth/github' });

      expect(response.statusCode).toBe(302);
      const location = new URL(String(response.headers.location));
      expect(`${location.origin}${location.pathname}`).toBe('https://github.com/login/oauth/authorize');
      expect(location.searchParams.get('client_id')).toBe('test-client-id');
      expect(location.searchParams.get('scope')).toBe('repo workflow');
    });

    it('refuses Fastly OAuth when it is not configured', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/oauth/fastly' });
      expect(response.statusCode).toBe(401);
    });

    it('answers 404 for an unknown provider', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/oauth/gitlab' });
      expect(response.statusCode).toBe(404);
      expect(response.body).toContain('Unknown sign-in provider: gitlab');
    });

    it('requires a code on the callback', async () => {
      const response = await handle.fastify.inject({ method: 'GET', url: '/oauth/github/callback' });
      expect(response.statusCode).toBe(400);
      expect(response.body).toBe("No auth 'code' param provided");
    });

    it('accepts a Fastly API token', async () => {
      const request = form({ token: 'test-secret' });
      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/auth/fastly',
        payload: request.payload,
        headers: { ...request.headers, cookie: stateCookie({ login: {}, deployment: { src: SOURCE } }) },
      });

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe(`/${SOURCE}`);
      expect(responseState(response)).toEqual({ login: { fastly: 'test-secret' }, deployment: { src: SOURCE } });
    });

    it('rejects a Fastly API token Fastly does not know', async () => {
      const request = form({ token: 'unknown-token' });
      const response = await handle.fastify.inject({ method: 'POST', url: '/auth/fastly', ...request });

      expect(response.statusCode).toBe(401);
      expect(response.body).toContain('Fastly rejected the API token');
      expect(responseState(response)).toBeUndefined();
    });
  });
});

describe('OAuth callback', () => {
  let handle: TestHandle;

  afterEach(async () => {
    await handle.stop();
  });

  it('stores the exchanged token and returns to the source', async () => {
    const requests: Array<{ url: string; body: unknown }> = [];
    handle = await startTestServer({
      fetch: async (input, init) => {
        requests.push({ url: input, body: JSON.parse(String(init?.body)) });
        return new Response(JSON.stringify({ access_token: 'gh-test-token', token_type: 'bearer' }), {
          status: 200,
          headers: { 'content-type': 'application/json' },
        });
      },
    });

    const response = await handle.fastify.inject({
      method: 'GET',
      url: '/oauth/github/callback?code=test-code',
      headers: { cookie: stateCookie({ login: {}, deployment: { src: SOURCE } }) },
    });

    expect(response.statusCode).toBe(302);
    expect(response.headers.location).toBe(`/${SOURCE}`);
    expect(responseState(response)).toEqual({ login: { github: 'gh-test-token' }, deployment: { src: SOURCE } });
    expect(requests).toEqual([
      {
        url: 'https://github.com/login/oauth/access_token',
        body: { client_id: 'test-client-id', client_secret: 'test-secret', code: 'test-code' },
      },
    ]);
  });

  it('shows the provider error when the code is rejected', async () => {
    handle = await startTestServer({
      fetch: async () =>
        new Response(
          JSON.stringify({ error: 'bad_verification_code', error_description: 'The code passed is incorrect or expired.' }),
          { status: 200, headers: { 'content-type': 'application/json' } }
        ),
    });

    const response = await handle.fastify.inject({ method: 'GET', url: '/oauth/github/callback?code=stale' });

    expect(response.statusCode).toBe(401);
    expect(response.body).toContain('The code passed is incorrect or expired.');
    expect(responseState(response)).toBeUndefined();
  });

  it('forks without a template when templates are not required', async () => {
    handle = await startTestServer({
      config: testConfig({
        github: { client_id: 'test-client-id', client_secret: 'test-secret', require_template: false },
      }),
    });
    seed(handle);

    const request = form({ repository: 'octo-org/plain' });
    const response = await handle.fastify.inject({
      method: 'POST',
      url: '/fork',
      payload: request.payload,
      headers: { ...request.headers, cookie: stateCookie({ login: SIGNED_IN, deployment: {} }) },
    });

    expect(response.statusCode).toBe(302);
    expect(responseState(response)?.deployment).toEqual({ src: 'octo-org/plain', dest: 'octo-user/plain' });
    expect(methods(handle.calls)).toContain('github.forkRepository');
  });
});
