/**
 * Configuration loader
 *
 * Reads launchpad.yaml, resolves ${ENV:VAR} and ${file:path} references and
 * validates the result. Client secrets must come from a reference.
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';
import { LaunchpadConfigSchema, isCredentialField, type LaunchpadConfig } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, LaunchpadError } from '../utils/errors.js';

export type { LaunchpadConfig, LaunchpadConfigInput, FastlyOAuthConfig } from './schema.js';
export { LaunchpadConfigSchema, isCredentialField } from './schema.js';

const MAX_FILE_SIZE = 1024 * 1024;

const REFERENCE = /^\$\{(ENV:[A-Z_][A-Z0-9_]*|file:.+)\}$/;

export interface ConfigLoadOptions {
  /** block (default) refuses a literal client secret; warn only logs it */
  enforcement?: 'warn' | 'block';
  /** Remove *CLIENT_SECRET* environment variables once read (default: true) */
  scrub_env_vars?: boolean;
}

/**
 * Load configuration from a YAML file
 *
 * ${file:} paths resolve against, and must stay inside, the config file's directory.
 *
 * @throws ConfigurationError if the file is invalid or holds a literal secret (block mode)
 */
export async function loadConfig(
  configPath: string,
  options: ConfigLoadOptions = {}
): Promise<LaunchpadConfig> {
  const { enforcement = 'block', scrub_env_vars = true } = options;

  logger.info(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_FILE_SIZE) {
      throw new ConfigurationError(`Config file ${configPath} exceeds 1MB size limit`, 'config_too_large');
    }

    const rawConfig: unknown = yaml.parse(await fs.readFile(configPath, 'utf-8'), {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    });

    const baseDir = path.dirname(path.resolve(configPath));
    const config = parseConfig(await resolveReferences(rawConfig, enforcement, baseDir));

    if (scrub_env_vars) {
      scrubEnvironmentVariables();
    }

    logger.info('[config] Configuration loaded successfully');
    return config;
  } catch (error) {
    if (error instanceof LaunchpadError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Validate an already-resolved config object and apply defaults
 */
export function parseConfig(raw: unknown): LaunchpadConfig {
  const result = LaunchpadConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

async function resolveReferences(
  value: unknown,
  enforcement: 'warn' | 'block',
  baseDir: string
): Promise<unknown> {
  if (typeof value === 'string') {
    const envMatch = value.match(/^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/);
    if (envMatch?.[1]) {
      const resolved = process.env[envMatch[1]];
      if (resolved === undefined) {
        throw new ConfigurationError(`Environment variable ${envMatch[1]} not found`, 'config_resolution_error');
      }
      return resolved;
    }

    const fileMatch = value.match(/^\$\{file:(.+)\}$/);
    if (fileMatch?.[1]) {
      return readSecretFile(fileMatch[1], baseDir);
    }
    return value;
  }

  if (Array.isArray(value)) {
    const items: unknown[] = [];
    for (const item of value) {
      items.push(await resolveReferences(item, enforcement, baseDir));
    }
    return items;
  }

  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'string' && isCredentialField(key) && !REFERENCE.test(entry)) {
        const message = entry.startsWith('${')
          ? `Credential field '${key}' has unresolved reference: ${entry}`
          : `Credential field '${key}' contains literal value - use \${ENV:VAR} or \${file:path}`;
        if (enforcement === 'block') {
          throw new ConfigurationError(message, 'literal_secret_detected');
        }
        logger.warn(`[config] ${message}`);
      }
      resolved[key] = await resolveReferences(entry, enforcement, baseDir);
    }
    return resolved;
  }

  return value;
}

async function readSecretFile(filePath: string, baseDir: string): Promise<string> {
  try {
    const realPath = await fs.realpath(path.resolve(baseDir, filePath));
    const realBase = await fs.realpath(baseDir);
    if (!realPath.startsWith(realBase + path.sep)) {
      throw new ConfigurationError(`Secret file path escapes allowed directory: ${filePath}`, 'path_traversal_blocked');
    }

    const stats = await fs.stat(realPath);
    if (stats.size > MAX_FILE_SIZE) {
      throw new ConfigurationError(`Secret file ${realPath} exceeds 1MB`, 'file_too_large');
    }
    const mode = stats.mode & 0o777;
    if (mode > 0o600) {
      logger.warn(`[config] Secret file ${realPath} has permissive permissions (${mode.toString(8)}) - should be 0600 or 0400`);
    }

    return (await fs.readFile(realPath, 'utf-8')).trim();
  } catch (error) {
    if (error instanceof LaunchpadError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Cannot read secret file ${filePath}: ${error.message}`, 'file_resolution_error');
    }
    throw error;
  }
}

function scrubEnvironmentVariables(): void {
  const scrubbed = Object.keys(process.env).filter(key => isCredentialField(key));
  for (const key of scrubbed) {
    delete process.env[key];
  }
  if (scrubbed.length > 0) {
    logger.info(`[config] Scrubbed ${scrubbed.length} environment variables: ${scrubbed.join(', ')}`);
  }
}
