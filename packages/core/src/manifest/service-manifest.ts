/**
 * Editable service manifest (fastly.toml)
 *
 * An existing `service_id` is replaced through toml-patch, which rewrites
 * only the values that changed. An absent one is added as a single line at
 * the end of the root table. Either way the result is parsed again before it
 * is handed back, and the file keeps its own line endings.
 */

import { parse as parseStrict, TomlError } from 'smol-toml';
import tomlPatch from 'toml-patch';
import { ManifestParseError } from '../utils/errors.js';

export const SERVICE_ID_KEY = 'service_id';

const TABLE_HEADER = /^\s*\[\[?\s*[A-Za-z0-9_"'-][^\]]*\]\]?\s*(#.*)?$/;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDocument(text: string): Record<string, unknown> {
  try {
    return parseStrict(text);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ManifestParseError(`Manifest is not valid TOML: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Document without its service id, serialized for comparing before and after an edit
 */
function withoutServiceId(document: Record<string, unknown>): string {
  const rest = { ...document };
  delete rest[SERVICE_ID_KEY];
  return JSON.stringify(rest);
}

export class EditableManifest {
  private document: Record<string, unknown>;
  private pendingId: string | undefined;
  private readonly eol: string;

  private constructor(
    private readonly source: string,
    document: Record<string, unknown>
  ) {
    this.document = document;
    this.eol = source.includes('\r\n') ? '\r\n' : '\n';
  }

  /**
   * @throws ManifestParseError if the text is not a well-formed TOML document
   */
  static load(text: string): EditableManifest {
    parseDocument(text);

    let document: unknown;
    try {
      document = tomlPatch.parse(text.replace(/\r\n/g, '\n'));
    } catch (error) {
      throw new ManifestParseError(
        `Manifest could not be loaded for editing: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (!isTable(document)) {
      throw new ManifestParseError('Manifest must be a TOML table');
    }

    return new EditableManifest(text, document);
  }

  get serviceId(): string | undefined {
    const value = this.pendingId ?? this.document[SERVICE_ID_KEY];
    return typeof value === 'string' ? value : undefined;
  }

  setServiceId(id: string): void {
    this.pendingId = id;
  }

  /**
   * @throws ManifestParseError if the edited text no longer parses to the same document
   */
  render(): string {
    if (this.pendingId === undefined) {
      return this.source;
    }

    const rendered = SERVICE_ID_KEY in this.document
      ? this.replaceServiceId(this.pendingId)
      : this.insertServiceId(this.pendingId);
    if (rendered === undefined) {
      throw new ManifestParseError(`Could not set ${SERVICE_ID_KEY} in the manifest`);
    }
    return rendered;
  }

  private replaceServiceId(id: string): string | undefined {
    const normalized = this.source.replace(/\r\n/g, '\n');
    let patched = tomlPatch.patch(normalized, { ...this.document, [SERVICE_ID_KEY]: id });
    if (normalized.endsWith('\n') && !patched.endsWith('\n')) {
      patched += '\n';
    }
    const text = this.eol === '\n' ? patched : patched.replace(/\n/g, this.eol);
    return this.verified(text, id);
  }

  private insertServiceId(id: string): string | undefined {
    const line = `${SERVICE_ID_KEY} = ${JSON.stringify(id)}`;
    const lines = this.source.split(this.eol);

    // Just above the first table header that leaves the key in the root table,
    // skipping back over the blank lines and comments belonging to that header
    for (let index = 0; index < lines.length; index++) {
      if (!TABLE_HEADER.test(lines[index] ?? '')) {
        continue;
      }
      let at = index;
      while (at > 0 && /^\s*(#.*)?$/.test(lines[at - 1] ?? '')) {
        at--;
      }
      if (at === 0) {
        at = index;
      }
      const text = [...lines.slice(0, at), line, ...lines.slice(at)].join(this.eol);
      const checked = this.verified(text, id);
      if (checked !== undefined) {
        return checked;
      }
    }

    // No tables: the key goes last
    if (this.source.length === 0) {
      return this.verified(`${line}${this.eol}`, id);
    }
    const text = this.source.endsWith(this.eol)
      ? `${this.source}${line}${this.eol}`
      : `${this.source}${this.eol}${line}`;
    return this.verified(text, id);
  }

  private verified(text: string, id: string): string | undefined {
    let document: Record<string, unknown>;
    try {
      document = parseStrict(text);
    } catch (error) {
      if (error instanceof TomlError) {
        return undefined;
      }
      throw error;
    }
    const original = parseDocument(this.source);
    if (document[SERVICE_ID_KEY] !== id || withoutServiceId(document) !== withoutServiceId(original)) {
      return undefined;
    }
    return text;
  }
}
