/**
 * API Response Envelope Helpers
 *
 * JSON routes answer with the standard envelope:
 * - Success: { ok: true, data: T }
 * - Error: { ok: false, error: { code, message, details? } }
 *
 * @see packages/contracts/src/envelope.ts for the schemas
 */

import type { ErrorEnvelope, SuccessEnvelope } from '@launchpad/contracts';
import { ErrorCodes, type ErrorCode } from '@launchpad/contracts';
import {
  AuthError,
  ExternalApiError,
  LaunchpadError,
  NotFoundError,
  PreconditionError,
  ValidationError,
} from '@launchpad/core';

export { ErrorCodes };

/**
 * @example
 * return reply.send(wrapSuccess({ service_id: 'svc-1', active: false }));
 */
export function wrapSuccess<T>(data: T): SuccessEnvelope<T> {
  return { ok: true, data };
}

/**
 * @example
 * return reply.status(409).send(wrapError(ErrorCodes.PRECONDITION_FAILED, 'No service has been provisioned yet'));
 */
export function wrapError(code: string, message: string, details?: unknown[]): ErrorEnvelope {
  return {
    ok: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

export function errorCodeFor(error: LaunchpadError): ErrorCode {
  if (error instanceof PreconditionError) return ErrorCodes.PRECONDITION_FAILED;
  if (error instanceof AuthError) return ErrorCodes.UNAUTHORIZED;
  if (error instanceof ExternalApiError) return ErrorCodes.UPSTREAM_ERROR;
  if (error instanceof NotFoundError) return ErrorCodes.NOT_FOUND;
  if (error instanceof ValidationError) return ErrorCodes.VALIDATION_ERROR;
  return error.statusCode < 500 ? ErrorCodes.BAD_REQUEST : ErrorCodes.INTERNAL_ERROR;
}
