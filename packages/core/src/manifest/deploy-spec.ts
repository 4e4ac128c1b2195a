/**
 * Deploy configuration spec
 *
 * The `[setup]` table of a repository's fastly.toml declares the backends and
 * dictionaries a new service needs, with defaults and the prompts the wizard
 * shows for values the user must supply.
 */

import { parse, TomlError } from 'smol-toml';
import { z } from 'zod';
import { SpecParseError } from '../utils/errors.js';

export const BackendSpecSchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  port: z.number().int().min(1).max(65535).optional(),
  prompt: z.string().optional(),
});

export const DictionaryItemSpecSchema = z.object({
  key: z.string().min(1),
  input_type: z.string().min(1),
  prompt: z.string().optional(),
  value: z.string().optional(),
});

export const DictionarySpecSchema = z.object({
  name: z.string().min(1),
  prompt: z.string().optional(),
  items: z.array(DictionaryItemSpecSchema).default([]),
});

export const DeployConfigSpecSchema = z.object({
  backends: z.array(BackendSpecSchema).default([]),
  dictionaries: z.array(DictionarySpecSchema).default([]),
});

export type BackendSpec = z.infer<typeof BackendSpecSchema>;
export type DictionaryItemSpec = z.infer<typeof DictionaryItemSpecSchema>;
export type DictionarySpec = z.infer<typeof DictionarySpecSchema>;
export type DeployConfigSpec = z.infer<typeof DeployConfigSpecSchema>;

const SpecDocumentSchema = z.object({
  setup: DeployConfigSpecSchema.optional(),
});

/**
 * Parse the `[setup]` table of a TOML document. A document without one
 * declares nothing, which is a valid spec.
 *
 * @throws SpecParseError if the document is not valid TOML or `[setup]` is malformed
 */
export function parseDeploySpec(text: string): DeployConfigSpec {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new SpecParseError(`Deploy configuration is not valid TOML: ${error.message}`, {
        line: error.line,
        column: error.column,
      });
    }
    throw error;
  }

  const result = SpecDocumentSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SpecParseError(`Invalid deploy configuration: ${issues}`);
  }

  return result.data.setup ?? { backends: [], dictionaries: [] };
}

/**
 * Form field name carrying the user's value for a dictionary item
 */
export function dictionaryFieldName(dictionary: string, key: string): string {
  return `dict.${dictionary}.${key}`;
}

/**
 * Pull `dict.<dictionary>.<key>` fields out of a submitted form, keyed
 * `<dictionary>.<key>`
 */
export function extractOverrides(form: Record<string, unknown>): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [field, value] of Object.entries(form)) {
    if (field.startsWith('dict.') && typeof value === 'string') {
      overrides[field.slice('dict.'.length)] = value;
    }
  }
  return overrides;
}
