/**
 * Collaborators shared by every route module
 */

import { ValidationError, type DeploymentStatusPoller, type LaunchpadConfig, type ProvisioningPipeline, type SourceHost } from '@launchpad/core';
import type { FastifyRequest } from 'fastify';
import type { z } from 'zod';
import type { AuthCoordinator } from '../auth/auth-coordinator.js';
import { RequestContext } from '../context/request-context.js';

export interface RouteDependencies {
  config: LaunchpadConfig;
  source: SourceHost;
  auth: AuthCoordinator;
  pipeline: ProvisioningPipeline;
  poller: DeploymentStatusPoller;
}

export function contextFor(request: FastifyRequest, deps: RouteDependencies): RequestContext {
  return RequestContext.fromRequest(request, deps.config.session.cookie_name);
}

/**
 * Validate a submitted form or query string
 *
 * @throws ValidationError listing each failing field
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const message = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid request: ${message}`);
  }
  return result.data;
}
