/**
 * AuthCoordinator
 *
 * Runs the OAuth authorization-code flow for GitHub and Fastly and resolves
 * the identity behind a stored credential. Credentials live only in the
 * session cookie; nothing is kept server-side.
 */

import {
  AuthError,
  ExternalApiError,
  logger,
  recordCredential,
  type ComputePlatform,
  type ComputeUser,
  type ExternalProvider,
  type IdentityView,
  type LaunchpadConfig,
  type LoginState,
  type Provider,
  type SessionState,
  type SourceHost,
  type SourceUser,
} from '@launchpad/core';
import { z } from 'zod';
import type { FetchFn } from '../clients/api-client.js';

export type ProviderIdentity = IdentityView<SourceUser, ComputeUser>;

export interface AuthCoordinatorConfig {
  config: LaunchpadConfig;
  source: SourceHost;
  compute: ComputePlatform;
  fetch?: FetchFn;
}

interface AuthorizeEndpoints {
  clientId: string;
  clientSecret: string;
  authorizeUrl: string;
  tokenUrl: string;
  scopes: string;
}

const tokenResponseSchema = z.union([
  z.object({ error: z.string(), error_description: z.string().optional() }),
  z.object({ access_token: z.string().min(1) }),
]);

const PROVIDER_LABELS: Record<ExternalProvider, string> = {
  github: 'GitHub',
  fastly: 'Fastly',
};

export class AuthCoordinator {
  private config: LaunchpadConfig;
  private source: SourceHost;
  private compute: ComputePlatform;
  private fetchFn: FetchFn;

  constructor(options: AuthCoordinatorConfig) {
    this.config = options.config;
    this.source = options.source;
    this.compute = options.compute;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * URL of the provider's consent page
   *
   * @throws AuthError when the provider has no OAuth client configured
   */
  beginAuthorizeFlow(provider: Provider): string {
    const endpoints = this.endpoints(provider);
    const url = new URL(endpoints.authorizeUrl);
    url.searchParams.set('client_id', endpoints.clientId);
    url.searchParams.set('scope', endpoints.scopes);
    if (provider === 'fastly') {
      url.searchParams.set('response_type', 'code');
    }
    const redirectUri = this.redirectUri(provider);
    if (redirectUri) {
      url.searchParams.set('redirect_uri', redirectUri);
    }
    return url.toString();
  }

  /**
   * Exchange an authorization code for an access token
   *
   * @throws ExternalApiError when the token endpoint answers non-2xx or is unreachable
   * @throws AuthError when the token endpoint rejects the code
   */
  async completeAuthorizeFlow(provider: Provider, code: string): Promise<string> {
    const endpoints = this.endpoints(provider);
    const label = PROVIDER_LABELS[provider];
    const redirectUri = this.redirectUri(provider);

    const params: Record<string, string> = {
      client_id: endpoints.clientId,
      client_secret: endpoints.clientSecret,
      code,
    };
    if (redirectUri) {
      params.redirect_uri = redirectUri;
    }

    let init: RequestInit;
    if (provider === 'github') {
      init = {
        method: 'POST',
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
        body: JSON.stringify(params),
      };
    } else {
      init = {
        method: 'POST',
        headers: { Accept: 'application/json', 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ grant_type: 'authorization_code', ...params }).toString(),
      };
    }

    let response: Response;
    try {
      response = await this.fetchFn(endpoints.tokenUrl, init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalApiError(`${label} token exchange failed: ${message}`, provider);
    }

    if (!response.ok) {
      const text = (await response.text()).trim();
      throw new ExternalApiError(
        `${label} token exchange failed: ${text || String(response.status)}`,
        provider,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ExternalApiError(`${label} token exchange failed: response was not JSON`, provider, response.status);
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalApiError(`${label} token exchange failed: no access token in response`, provider);
    }
    if ('error' in parsed.data) {
      throw new AuthError(parsed.data.error_description ?? parsed.data.error, {
        provider,
        error: parsed.data.error,
      });
    }

    logger.info(`[auth] Completed ${label} authorization`);
    return parsed.data.access_token;
  }

  /**
   * Identity behind a credential. No credential means no request; a rejected
   * credential (401/403) reads as signed out.
   */
  resolveIdentity(provider: 'github', credential: string | undefined): Promise<SourceUser | null>;
  resolveIdentity(provider: 'fastly', credential: string | undefined): Promise<ComputeUser | null>;
  async resolveIdentity(
    provider: Provider,
    credential: string | undefined
  ): Promise<SourceUser | ComputeUser | null> {
    if (!credential) {
      return null;
    }
    return provider === 'github' ? this.source.fetchUser(credential) : this.compute.fetchUser(credential);
  }

  async identityView(login: LoginState): Promise<ProviderIdentity> {
    const github = await this.resolveIdentity('github', login.github);
    const fastly = await this.resolveIdentity('fastly', login.fastly);
    return { github, fastly };
  }

  signIn(state: SessionState, provider: Provider, credential: string): SessionState {
    return recordCredential(state, provider, credential);
  }

  /**
   * Sign in to Fastly with a pasted API token
   *
   * @throws AuthError when Fastly rejects the token
   */
  async signInWithToken(state: SessionState, token: string): Promise<SessionState> {
    const trimmed = token.trim();
    if (!trimmed) {
      throw new AuthError('A Fastly API token is required');
    }
    const user = await this.compute.fetchUser(trimmed);
    if (!user) {
      throw new AuthError('Fastly rejected the API token');
    }
    logger.info(`[auth] Fastly token accepted for customer ${user.customer_id}`);
    return recordCredential(state, 'fastly', trimmed);
  }

  /** Whether the provider can be signed into through OAuth */
  supportsOAuth(provider: Provider): boolean {
    return provider === 'github' || this.config.fastly.oauth !== undefined;
  }

  private endpoints(provider: Provider): AuthorizeEndpoints {
    if (provider === 'github') {
      const github = this.config.github;
      const base = github.oauth_url.replace(/\/+$/, '');
      return {
        clientId: github.client_id,
        clientSecret: github.client_secret,
        authorizeUrl: `${base}/authorize`,
        tokenUrl: `${base}/access_token`,
        scopes: github.scopes,
      };
    }

    const oauth = this.config.fastly.oauth;
    if (!oauth) {
      throw new AuthError('Fastly sign-in through OAuth is not configured; paste an API token instead');
    }
    return {
      clientId: oauth.client_id,
      clientSecret: oauth.client_secret,
      authorizeUrl: oauth.authorize_url,
      tokenUrl: oauth.token_url,
      scopes: oauth.scopes,
    };
  }

  private redirectUri(provider: Provider): string | undefined {
    const publicUrl = this.config.server.public_url;
    if (!publicUrl) {
      return undefined;
    }
    return `${publicUrl.replace(/\/+$/, '')}/oauth/${provider}/callback`;
  }
}
