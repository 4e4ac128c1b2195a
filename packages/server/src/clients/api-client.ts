/**
 * Shared plumbing for the GitHub and Fastly REST clients
 *
 * One request per call, no retries. Non-success responses become
 * ExternalApiError with the response body as the message.
 */

import { ExternalApiError, type ExternalProvider } from '@launchpad/core';
import type { z } from 'zod';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  baseUrl: string;
  /** Replaces global fetch; tests pass an in-process stand-in */
  fetch?: FetchFn;
  userAgent?: string;
}

export interface SendOptions {
  credential?: string;
  json?: unknown;
  form?: Record<string, string | number>;
}

export abstract class ApiClient {
  protected readonly baseUrl: string;
  protected readonly userAgent: string;
  private readonly fetchFn: FetchFn;

  constructor(
    protected readonly provider: ExternalProvider,
    options: ApiClientOptions
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? 'Launchpad';
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  protected abstract authHeaders(credential: string): Record<string, string>;

  protected abstract get accept(): string;

  protected async send(
    action: string,
    method: string,
    path: string,
    options: SendOptions = {}
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: this.accept,
      'User-Agent': this.userAgent,
    };
    if (options.credential) {
      Object.assign(headers, this.authHeaders(options.credential));
    }

    let body: string | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    } else if (options.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(options.form)) {
        params.set(key, String(value));
      }
      body = params.toString();
    }

    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, { method, headers, body });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalApiError(`${action}: ${message}`, this.provider);
    }
  }

  /**
   * @throws ExternalApiError carrying the response body
   */
  protected async fail(action: string, response: Response): Promise<never> {
    const text = (await response.text()).trim();
    const detail = text || `${response.status} ${response.statusText}`.trim();
    throw new ExternalApiError(`${action}: ${detail}`, this.provider, response.status);
  }

  protected async expectOk(action: string, response: Response): Promise<void> {
    if (!response.ok) {
      await this.fail(action, response);
    }
  }

  protected async parse<S extends z.ZodTypeAny>(
    action: string,
    response: Response,
    schema: S
  ): Promise<z.infer<S>> {
    await this.expectOk(action, response);

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ExternalApiError(`${action}: response was not JSON`, this.provider, response.status);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ExternalApiError(
        `${action}: unexpected response shape from ${this.provider}`,
        this.provider,
        response.status
      );
    }
    return result.data;
  }
}
