/**
 * Custom error classes
 *
 * All Launchpad errors extend LaunchpadError so the top-level handler can map
 * them to a status code and show the message unchanged.
 */

export class LaunchpadError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LaunchpadError';
  }
}

/**
 * Missing or rejected credential, expired or reused authorization code
 */
export class AuthError extends LaunchpadError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'authentication_failed', 401, details);
    this.name = 'AuthError';
  }
}

export type ExternalProvider = 'github' | 'fastly';

/**
 * Non-success response from GitHub or Fastly. The provider's message is
 * passed through verbatim.
 */
export class ExternalApiError extends LaunchpadError {
  constructor(
    message: string,
    public provider: ExternalProvider,
    public status?: number
  ) {
    super(message, 'external_api_error', 502, { provider, status });
    this.name = 'ExternalApiError';
  }
}

export class ManifestParseError extends LaunchpadError {
  constructor(message: string) {
    super(message, 'manifest_parse_error', 422);
    this.name = 'ManifestParseError';
  }
}

export class SpecParseError extends LaunchpadError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'spec_parse_error', 422, details);
    this.name = 'SpecParseError';
  }
}

/**
 * Dictionary item with neither a submitted value nor a declared default
 */
export class MissingValueError extends LaunchpadError {
  constructor(public key: string) {
    super(`No value provided for dictionary key ${key}`, 'missing_value', 400, { key });
    this.name = 'MissingValueError';
  }
}

/**
 * Workflow step invoked out of order. `fact` names what the state is missing.
 */
export class PreconditionError extends LaunchpadError {
  constructor(
    message: string,
    public fact: string
  ) {
    super(message, 'precondition_failed', 409, { fact });
    this.name = 'PreconditionError';
  }
}

export class NotATemplateError extends LaunchpadError {
  constructor(public nwo: string) {
    super(
      `Repository ${nwo} is not a template repository, so it cannot be deployed from`,
      'not_a_template',
      400,
      { nwo }
    );
    this.name = 'NotATemplateError';
  }
}

export class ValidationError extends LaunchpadError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'validation_failed', 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends LaunchpadError {
  constructor(message: string) {
    super(message, 'not_found', 404);
    this.name = 'NotFoundError';
  }
}

export class ConfigurationError extends LaunchpadError {
  constructor(message: string, code = 'configuration_error') {
    super(message, code, 500);
    this.name = 'ConfigurationError';
  }
}
