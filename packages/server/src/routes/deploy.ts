/**
 * Deploy Routes
 *
 * Fork, provision, status polling and deployment reset. Each handler reads
 * the state cookie, applies one transition and writes the cookie back.
 */

import {
  AuthError,
  extractOverrides,
  isNwo,
  isServiceSlug,
  LaunchpadError,
  NotATemplateError,
  NotFoundError,
  parseDeploySpec,
  PreconditionError,
  recordFork,
  recordService,
  resetDeployment,
  resolveDestination,
  returnLocation,
  type SourceRepository,
} from '@launchpad/core';
import type { DeployStatus } from '@launchpad/contracts';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { errorCodeFor, ErrorCodes, wrapError, wrapSuccess } from '../http/reply-envelope.js';
import { contextFor, parseInput, type RouteDependencies } from './context.js';

const repositoryField = z.string().refine(isNwo, { message: 'must be owner/name' });

const forkBodySchema = z.object({
  repository: repositoryField,
});

const deployBodySchema = z
  .object({
    repository: repositoryField,
    service_name: z
      .string()
      .trim()
      .optional()
      .transform(value => (value ? value : undefined))
      .refine(value => value === undefined || isServiceSlug(value), {
        message: 'must be lowercase words joined by hyphens',
      }),
  })
  .passthrough();

export async function registerDeployRoutes(fastify: FastifyInstance, deps: RouteDependencies): Promise<void> {
  const { config, source, pipeline, poller } = deps;

  // ==========================================================================
  // POST /fork - Copy the source repository into the user's account
  // ==========================================================================
  fastify.post('/fork', async (request, reply) => {
    const { repository: nwo } = parseInput(forkBodySchema, request.body);
    const ctx = contextFor(request, deps);

    const credential = ctx.state.login.github;
    if (!credential) {
      throw new AuthError('Sign in to GitHub before forking');
    }

    const repository = await source.fetchRepository(nwo);
    if (!repository) {
      throw new NotFoundError(`No repository was found at github.com/${nwo}`);
    }

    let fork: SourceRepository;
    if (repository.is_template) {
      fork = await source.generateFromTemplate(credential, nwo, repository.name);
    } else if (config.github.require_template) {
      throw new NotATemplateError(nwo);
    } else {
      fork = await source.forkRepository(credential, nwo);
    }

    request.log.info(`[deploy] Forked ${nwo} to ${fork.full_name}`);
    ctx.update(recordFork(ctx.state, nwo, fork.full_name));
    ctx.commit(reply);
    return reply.redirect(`/${nwo}`);
  });

  // ==========================================================================
  // POST /deploy - Provision a service for the recorded fork
  // ==========================================================================
  fastify.post('/deploy', async (request, reply) => {
    const body = parseInput(deployBodySchema, request.body);
    const ctx = contextFor(request, deps);
    const { github, fastly } = ctx.state.login;

    if (!github) {
      throw new AuthError('Sign in to GitHub before deploying');
    }
    if (!fastly) {
      throw new AuthError('Sign in to Fastly before deploying');
    }

    const destination = resolveDestination(ctx.state, body.repository);
    if (!destination) {
      throw new PreconditionError(`Fork ${body.repository} before deploying it`, 'destination');
    }
    if (ctx.state.deployment.serviceId) {
      throw new PreconditionError(
        `A service has already been provisioned for ${destination}`,
        'service_id'
      );
    }

    const manifest = await source.getFile(github, destination, config.deploy.manifest_path);
    if (!manifest) {
      throw new NotFoundError(`${destination} has no ${config.deploy.manifest_path}, so it cannot be deployed`);
    }

    let specText = '';
    if (config.deploy.spec_path === config.deploy.manifest_path) {
      specText = manifest.content;
    } else {
      const specFile = await source.getFile(github, destination, config.deploy.spec_path);
      specText = specFile ? specFile.content : '';
    }

    const created = await pipeline.run({
      destination,
      manifest,
      spec: parseDeploySpec(specText),
      overrides: extractOverrides(body),
      credentials: { github, fastly },
      serviceName: body.service_name,
    });

    ctx.update(recordService(ctx.state, created));
    ctx.commit(reply);
    return reply.view('success', {
      title: 'Deployment started',
      destination,
      serviceId: created.id,
      applicationUrl: `https://${created.domain}`,
      actionsUrl: `https://github.com/${destination}/actions`,
    });
  });

  // ==========================================================================
  // GET /deploy/status - Activation status of the provisioned service (JSON)
  // ==========================================================================
  fastify.get('/deploy/status', async (request, reply) => {
    const ctx = contextFor(request, deps);
    try {
      const check = await poller.check(ctx.state);
      ctx.update(check.state);
      ctx.commit(reply);
      const status: DeployStatus = { service_id: check.serviceId, active: check.active };
      return reply.send(wrapSuccess(status));
    } catch (error) {
      if (error instanceof LaunchpadError) {
        request.log.warn(`[deploy] Status check failed: ${error.message}`);
        return reply.status(error.statusCode).send(wrapError(errorCodeFor(error), error.message));
      }
      request.log.error({ err: error }, '[deploy] Status check failed');
      return reply.status(500).send(wrapError(ErrorCodes.INTERNAL_ERROR, 'Status check failed'));
    }
  });

  // ==========================================================================
  // POST /deploy/reset - Forget the fork and service, keep the sign-ins
  // ==========================================================================
  fastify.post('/deploy/reset', async (request, reply) => {
    const ctx = contextFor(request, deps);
    const location = returnLocation(ctx.state);
    ctx.update(resetDeployment(ctx.state));
    ctx.commit(reply);
    return reply.redirect(location);
  });
}
