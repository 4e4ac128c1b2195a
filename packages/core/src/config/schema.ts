/**
 * Configuration schema (Zod)
 *
 * Validates launchpad.yaml structure into a type-safe config object.
 */

import { z } from 'zod';
import { DEFAULT_STATE_COOKIE } from '../session/codec.js';

// ===== Server =====

const ServerConfigSchema = z
  .object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(8080),
    /** Public base URL, used to build OAuth redirect URIs */
    public_url: z.string().url().optional(),
    log_level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    trust_proxy: z.boolean().default(false),
  })
  .default({});

// ===== GitHub (source-control platform) =====

const GitHubConfigSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  scopes: z.string().default('repo workflow'),
  oauth_url: z.string().url().default('https://github.com/login/oauth'),
  api_url: z.string().url().default('https://api.github.com'),
  /** Refuse to deploy from repositories that are not flagged as templates */
  require_template: z.boolean().default(true),
});

// ===== Fastly (compute platform) =====

const FastlyOAuthConfigSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  authorize_url: z.string().url(),
  token_url: z.string().url(),
  scopes: z.string().default('global'),
});

const FastlyConfigSchema = z
  .object({
    api_url: z.string().url().default('https://api.fastly.com'),
    domain_suffix: z.string().default('edgecompute.app'),
    service_type: z.string().default('wasm'),
    oauth: FastlyOAuthConfigSchema.optional(),
  })
  .default({});

// ===== Deployment =====

const DeployConfigSchema = z
  .object({
    manifest_path: z.string().default('fastly.toml'),
    /** File holding the [setup] table; usually the manifest itself */
    spec_path: z.string().default('fastly.toml'),
    workflow_id: z.string().default('deploy.yml'),
    secret_name: z.string().default('FASTLY_API_TOKEN'),
    commit_message: z.string().default('Service provisioning via Launchpad'),
  })
  .default({});

const SessionConfigSchema = z
  .object({
    cookie_name: z.string().default(DEFAULT_STATE_COOKIE),
  })
  .default({});

// ===== Root Configuration Schema =====

export const LaunchpadConfigSchema = z.object({
  server: ServerConfigSchema,
  github: GitHubConfigSchema,
  fastly: FastlyConfigSchema,
  deploy: DeployConfigSchema,
  session: SessionConfigSchema,
});

export type LaunchpadConfig = z.infer<typeof LaunchpadConfigSchema>;
export type LaunchpadConfigInput = z.input<typeof LaunchpadConfigSchema>;
export type FastlyOAuthConfig = z.infer<typeof FastlyOAuthConfigSchema>;

// ===== Credential fields =====

/** Keys that must hold a ${ENV:} or ${file:} reference, never a literal */
export const CREDENTIAL_FIELD_PATTERNS = ['client_secret'] as const;

export function isCredentialField(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return CREDENTIAL_FIELD_PATTERNS.some(pattern => lowerKey.includes(pattern));
}
