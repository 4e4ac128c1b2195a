/**
 * Auth Routes
 *
 * OAuth round trips for GitHub and Fastly, Fastly token sign-in and
 * sign-out. Callbacks send the browser back to the repository it came from.
 */

import { isProvider, NotFoundError, resetLogin, returnLocation, type Provider } from '@launchpad/core';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { contextFor, parseInput, type RouteDependencies } from './context.js';

const callbackQuerySchema = z.object({
  code: z.string().optional(),
});

const tokenBodySchema = z.object({
  token: z.string().min(1, 'a Fastly API token is required'),
});

function requireProvider(value: string): Provider {
  if (!isProvider(value)) {
    throw new NotFoundError(`Unknown sign-in provider: ${value}`);
  }
  return value;
}

export async function registerAuthRoutes(fastify: FastifyInstance, deps: RouteDependencies): Promise<void> {
  const { auth } = deps;

  // ==========================================================================
  // GET /oauth/:provider - Redirect to the provider's consent page
  // ==========================================================================
  fastify.get<{ Params: { provider: string } }>('/oauth/:provider', async (request, reply) => {
    const provider = requireProvider(request.params.provider);
    return reply.redirect(auth.beginAuthorizeFlow(provider));
  });

  // ==========================================================================
  // GET /oauth/:provider/callback - Exchange the code and store the token
  // ==========================================================================
  fastify.get<{ Params: { provider: string } }>('/oauth/:provider/callback', async (request, reply) => {
    const provider = requireProvider(request.params.provider);
    const query = callbackQuerySchema.safeParse(request.query);
    const code = query.success ? query.data.code : undefined;
    if (!code) {
      return reply.status(400).type('text/plain').send("No auth 'code' param provided");
    }

    const ctx = contextFor(request, deps);
    const token = await auth.completeAuthorizeFlow(provider, code);
    ctx.update(auth.signIn(ctx.state, provider, token));
    ctx.commit(reply);

    request.log.info(`[auth] Signed in to ${provider}`);
    return reply.redirect(returnLocation(ctx.state));
  });

  // ==========================================================================
  // POST /auth/fastly - Sign in to Fastly with an API token
  // ==========================================================================
  fastify.post('/auth/fastly', async (request, reply) => {
    const { token } = parseInput(tokenBodySchema, request.body);
    const ctx = contextFor(request, deps);
    ctx.update(await auth.signInWithToken(ctx.state, token));
    ctx.commit(reply);
    return reply.redirect(returnLocation(ctx.state));
  });

  // ==========================================================================
  // POST /auth/reset - Sign out of both providers
  // ==========================================================================
  fastify.post('/auth/reset', async (request, reply) => {
    const ctx = contextFor(request, deps);
    ctx.update(resetLogin(ctx.state));
    ctx.commit(reply);
    return reply.redirect(returnLocation(ctx.state));
  });
}
