/**
 * Launchpad Server
 *
 * Fastify application serving the deploy wizard:
 * - Landing and per-repository deploy pages (EJS)
 * - OAuth sign-in for GitHub and Fastly
 * - Fork, provision and status routes
 *
 * All per-user state travels in one cookie; the process holds no sessions.
 * CORS is default deny.
 */

import fastifyCookie from '@fastify/cookie';
import fastifyCors from '@fastify/cors';
import fastifyFormbody from '@fastify/formbody';
import fastifyStatic from '@fastify/static';
import fastifyView from '@fastify/view';
import {
  DeploymentStatusPoller,
  LaunchpadError,
  logger,
  ProvisioningPipeline,
  sodiumSealer,
  type ComputePlatform,
  type LaunchpadConfig,
  type NameGenerator,
  type SecretSealer,
  type SourceHost,
} from '@launchpad/core';
import ejs from 'ejs';
import Fastify, { type FastifyInstance } from 'fastify';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { AuthCoordinator } from './auth/auth-coordinator.js';
import type { FetchFn } from './clients/api-client.js';
import { FastlyClient } from './clients/fastly-client.js';
import { GitHubClient } from './clients/github-client.js';
import { registerAuthRoutes } from './routes/auth.js';
import type { RouteDependencies } from './routes/context.js';
import { registerDeployRoutes } from './routes/deploy.js';
import { registerPageRoutes } from './routes/pages.js';

export interface ServerOptions {
  config: LaunchpadConfig;
  /** Collaborator overrides; the HTTP clients are built from config otherwise */
  source?: SourceHost;
  compute?: ComputePlatform;
  sealer?: SecretSealer;
  generateName?: NameGenerator;
  /** fetch used for OAuth token exchange and by the default clients */
  fetch?: FetchFn;
}

const CONTENT_SECURITY_POLICY =
  "default-src 'none'; script-src 'self'; style-src 'self'; connect-src 'self'; img-src 'self'; form-action 'self'; frame-ancestors 'none'; base-uri 'self'";

export class LaunchpadServer {
  private fastify: FastifyInstance | null = null;
  private config: LaunchpadConfig;
  private source: SourceHost;
  private compute: ComputePlatform;
  private sealer: SecretSealer;
  private generateName?: NameGenerator;
  private fetchFn?: FetchFn;

  constructor(options: ServerOptions) {
    this.config = options.config;
    this.fetchFn = options.fetch;
    this.source =
      options.source ?? new GitHubClient({ baseUrl: this.config.github.api_url, fetch: options.fetch });
    this.compute =
      options.compute ?? new FastlyClient({ baseUrl: this.config.fastly.api_url, fetch: options.fetch });
    this.sealer = options.sealer ?? sodiumSealer;
    this.generateName = options.generateName;
  }

  /**
   * Build the Fastify instance and register plugins and routes
   */
  async initialize(): Promise<void> {
    logger.info('[Server] Initializing Launchpad server...');

    const fastify = Fastify({
      logger: { level: this.config.server.log_level },
      trustProxy: this.config.server.trust_proxy,
      bodyLimit: 65536,
    });

    await fastify.register(fastifyCors, { origin: false });
    await fastify.register(fastifyCookie);
    await fastify.register(fastifyFormbody);

    // Views and assets sit beside src/ in the package
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const viewsPath = path.join(__dirname, '..', 'views');
    const publicPath = path.join(__dirname, '..', 'public');

    await fastify.register(fastifyView, {
      engine: { ejs },
      root: viewsPath,
      options: { views: [viewsPath] },
    });

    await fastify.register(fastifyStatic, {
      root: publicPath,
      prefix: '/',
      wildcard: false,
    });

    fastify.addHook('onSend', async (_request, reply, payload) => {
      reply.header('Content-Security-Policy', CONTENT_SECURITY_POLICY);
      reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
      reply.header('X-Content-Type-Options', 'nosniff');
      reply.header('X-Frame-Options', 'DENY');
      reply.header('Cache-Control', 'no-store');
      return payload;
    });

    fastify.setErrorHandler(async (error, request, reply) => {
      const status =
        error instanceof LaunchpadError
          ? error.statusCode
          : error.statusCode && error.statusCode >= 400
            ? error.statusCode
            : 500;

      if (status >= 500) {
        request.log.error({ err: error }, `[Server] ${request.method} ${request.url} failed`);
      } else {
        request.log.warn(`[Server] ${request.method} ${request.url}: ${error.message}`);
      }

      const exposed = error instanceof LaunchpadError || status < 500;
      return reply.status(status).view('error', {
        title: 'Something went wrong',
        status,
        message: exposed ? error.message : 'Internal server error',
      });
    });

    fastify.setNotFoundHandler(async (_request, reply) => {
      return reply.status(404).view('error', {
        title: 'Not found',
        status: 404,
        message: 'The page you requested could not be found',
      });
    });

    fastify.get('/health', async () => ({ status: 'ok' }));

    const deps: RouteDependencies = {
      config: this.config,
      source: this.source,
      auth: new AuthCoordinator({
        config: this.config,
        source: this.source,
        compute: this.compute,
        fetch: this.fetchFn,
      }),
      pipeline: new ProvisioningPipeline(
        {
          source: this.source,
          compute: this.compute,
          sealer: this.sealer,
          generateName: this.generateName,
        },
        {
          domainSuffix: this.config.fastly.domain_suffix,
          serviceType: this.config.fastly.service_type,
          workflowId: this.config.deploy.workflow_id,
          secretName: this.config.deploy.secret_name,
          commitMessage: this.config.deploy.commit_message,
        }
      ),
      poller: new DeploymentStatusPoller(this.compute),
    };

    await registerPageRoutes(fastify, deps);
    await registerDeployRoutes(fastify, deps);
    await registerAuthRoutes(fastify, deps);

    this.fastify = fastify;
    logger.info('[Router] All routes registered');
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    if (!this.fastify) {
      throw new Error('Server not initialized - call initialize() first');
    }

    const { host, port } = this.config.server;
    try {
      await this.fastify.listen({ host, port });
      logger.info(`[Server] Listening on http://${host}:${port}`);
    } catch (err) {
      logger.error({ err }, '[Server] Failed to start');
      throw err;
    }
  }

  async stop(): Promise<void> {
    logger.info('[Server] Shutting down...');
    if (this.fastify) {
      await this.fastify.close();
    }
    logger.info('[Server] Shutdown complete');
  }

  /**
   * Fastify instance, for tests to inject requests into
   */
  getServer(): FastifyInstance {
    if (!this.fastify) {
      throw new Error('Server not initialized');
    }
    return this.fastify;
  }
}
