// API envelope types and schemas
export {
  successEnvelopeSchema,
  errorEnvelopeSchema,
  apiResponseSchema,
  type SuccessEnvelope,
  type ErrorEnvelope,
  type ApiResponse,
} from './envelope.js';

// Standard error codes
export { ErrorCodes, type ErrorCode } from './error-codes.js';

// Deployment status polling
export { deployStatusSchema, deployStatusResponseSchema, type DeployStatus } from './deploy-status.js';
