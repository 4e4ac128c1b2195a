/**
 * GitHub REST client
 *
 * Implements the SourceHost SPI against api.github.com (or a GitHub
 * Enterprise base URL). Repository names are `owner/name` and go into the
 * path as-is; file paths are encoded segment by segment.
 */

import type {
  FileUpdate,
  RepositoryFile,
  RepositoryPublicKey,
  SourceHost,
  SourceRepository,
  SourceUser,
} from '@launchpad/core';
import { z } from 'zod';
import { ApiClient, type ApiClientOptions } from './api-client.js';

const userSchema = z.object({
  login: z.string(),
  name: z.string().nullable().optional(),
});

const repositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  owner: userSchema,
  default_branch: z.string(),
  description: z.string().nullable().optional(),
  forks_count: z.number().default(0),
  stargazers_count: z.number().default(0),
  is_template: z.boolean().default(false),
});

const contentSchema = z.object({
  path: z.string(),
  sha: z.string(),
  content: z.string(),
  encoding: z.literal('base64'),
});

const publicKeySchema = z.object({
  key_id: z.string(),
  key: z.string(),
});

export function encodeContentPath(path: string): string {
  return path
    .split('/')
    .filter(segment => segment.length > 0)
    .map(segment => encodeURIComponent(segment))
    .join('/');
}

export class GitHubClient extends ApiClient implements SourceHost {
  constructor(options: ApiClientOptions) {
    super('github', options);
  }

  protected get accept(): string {
    return 'application/vnd.github+json';
  }

  protected authHeaders(credential: string): Record<string, string> {
    return {
      Authorization: `Bearer ${credential}`,
      'X-GitHub-Api-Version': '2022-11-28',
    };
  }

  async fetchUser(credential: string): Promise<SourceUser | null> {
    const response = await this.send('Unable to load GitHub user', 'GET', '/user', { credential });
    if (response.status === 401 || response.status === 403) {
      return null;
    }
    return this.parse('Unable to load GitHub user', response, userSchema);
  }

  async fetchRepository(nwo: string): Promise<SourceRepository | null> {
    const action = `Unable to load repository ${nwo}`;
    const response = await this.send(action, 'GET', `/repos/${nwo}`);
    if (response.status === 404) {
      return null;
    }
    return this.parse(action, response, repositorySchema);
  }

  async generateFromTemplate(credential: string, nwo: string, name: string): Promise<SourceRepository> {
    const action = `Unable to create a repository from template ${nwo}`;
    const response = await this.send(action, 'POST', `/repos/${nwo}/generate`, {
      credential,
      json: { name, include_all_branches: false },
    });
    return this.parse(action, response, repositorySchema);
  }

  async forkRepository(credential: string, nwo: string): Promise<SourceRepository> {
    const action = `Unable to fork ${nwo}`;
    const response = await this.send(action, 'POST', `/repos/${nwo}/forks`, { credential, json: {} });
    return this.parse(action, response, repositorySchema);
  }

  async getFile(credential: string | undefined, nwo: string, path: string): Promise<RepositoryFile | null> {
    const action = `Unable to read ${path} from ${nwo}`;
    const response = await this.send(action, 'GET', `/repos/${nwo}/contents/${encodeContentPath(path)}`, {
      credential,
    });
    if (response.status === 404) {
      return null;
    }
    const file = await this.parse(action, response, contentSchema);
    return {
      path: file.path,
      sha: file.sha,
      // GitHub wraps the base64 payload at 60 columns
      content: Buffer.from(file.content.replace(/\s+/g, ''), 'base64').toString('utf8'),
    };
  }

  async updateFile(credential: string, nwo: string, update: FileUpdate): Promise<void> {
    const action = `Unable to update ${update.path} in ${nwo}`;
    const response = await this.send(action, 'PUT', `/repos/${nwo}/contents/${encodeContentPath(update.path)}`, {
      credential,
      json: {
        message: update.message,
        content: Buffer.from(update.content, 'utf8').toString('base64'),
        sha: update.sha,
      },
    });
    await this.expectOk(action, response);
  }

  async enableWorkflow(credential: string, nwo: string, workflowId: string): Promise<void> {
    const action = `Unable to enable workflow ${workflowId} in ${nwo}`;
    const response = await this.send(
      action,
      'PUT',
      `/repos/${nwo}/actions/workflows/${encodeURIComponent(workflowId)}/enable`,
      { credential }
    );
    await this.expectOk(action, response);
  }

  async getActionsPublicKey(credential: string, nwo: string): Promise<RepositoryPublicKey> {
    const action = `Unable to read the Actions public key of ${nwo}`;
    const response = await this.send(action, 'GET', `/repos/${nwo}/actions/secrets/public-key`, { credential });
    return this.parse(action, response, publicKeySchema);
  }

  async putActionsSecret(
    credential: string,
    nwo: string,
    name: string,
    secret: { encrypted_value: string; key_id: string }
  ): Promise<void> {
    const action = `Unable to store secret ${name} in ${nwo}`;
    const response = await this.send(
      action,
      'PUT',
      `/repos/${nwo}/actions/secrets/${encodeURIComponent(name)}`,
      { credential, json: secret }
    );
    await this.expectOk(action, response);
  }
}
