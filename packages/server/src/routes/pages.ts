/**
 * Page Routes
 *
 * The landing page and the per-repository deploy page.
 */

import {
  dictionaryFieldName,
  describeWorkflow,
  isNwo,
  NotFoundError,
  parseDeploySpec,
  selectSource,
  type DeployConfigSpec,
} from '@launchpad/core';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { contextFor, type RouteDependencies } from './context.js';

const landingQuerySchema = z.object({
  repository: z.string().optional(),
});

export interface DictionaryFieldView {
  key: string;
  field: string;
  prompt: string;
  inputType: string;
  defaultValue?: string;
  required: boolean;
}

export interface DictionaryView {
  name: string;
  prompt?: string;
  items: DictionaryFieldView[];
}

export function dictionaryViews(spec: DeployConfigSpec): DictionaryView[] {
  return spec.dictionaries.map(dictionary => ({
    name: dictionary.name,
    prompt: dictionary.prompt,
    items: dictionary.items.map(item => ({
      key: item.key,
      field: dictionaryFieldName(dictionary.name, item.key),
      prompt: item.prompt ?? item.key,
      inputType: item.input_type === 'password' ? 'password' : 'text',
      defaultValue: item.value,
      required: item.value === undefined,
    })),
  }));
}

export async function registerPageRoutes(fastify: FastifyInstance, deps: RouteDependencies): Promise<void> {
  const { config, source, auth } = deps;

  // ==========================================================================
  // GET / - Landing page, optionally with a deploy button
  // ==========================================================================
  fastify.get('/', async (request, reply) => {
    const query = landingQuerySchema.safeParse(request.query);
    const repository = query.success && query.data.repository && isNwo(query.data.repository)
      ? query.data.repository
      : null;

    return reply.view('index', { title: 'Launchpad', repository });
  });

  // ==========================================================================
  // GET /:owner/:repo - Deploy page for one source repository
  // ==========================================================================
  fastify.get<{ Params: { owner: string; repo: string } }>('/:owner/:repo', async (request, reply) => {
    const nwo = `${request.params.owner}/${request.params.repo}`;
    if (!isNwo(nwo)) {
      throw new NotFoundError(`${nwo} is not a repository name`);
    }

    const ctx = contextFor(request, deps);
    ctx.update(selectSource(ctx.state, nwo));

    const repository = await source.fetchRepository(nwo);
    if (!repository) {
      throw new NotFoundError(`No repository was found at github.com/${nwo}`);
    }
    const identity = await auth.identityView(ctx.state.login);

    // A rejected credential would fail the read; public repositories need none
    const credential = identity.github ? ctx.state.login.github : undefined;
    const specFile = await source.getFile(credential, nwo, config.deploy.spec_path);
    const spec = specFile ? parseDeploySpec(specFile.content) : { backends: [], dictionaries: [] };
    const workflow = describeWorkflow(ctx.state, identity, nwo);

    ctx.commit(reply);
    return reply.view('deploy', {
      title: nwo,
      repository,
      identity: {
        github: identity.github ? identity.github.login : null,
        fastly: identity.fastly ? identity.fastly.name : null,
      },
      workflow,
      deployable: repository.is_template || !config.github.require_template,
      dictionaries: dictionaryViews(spec),
      backends: spec.backends,
      fastlyOAuth: auth.supportsOAuth('fastly'),
    });
  });
}
