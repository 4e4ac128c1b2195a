import { z } from 'zod';
import { apiResponseSchema } from './envelope.js';

/**
 * GET /deploy/status payload, polled by the success page
 */
export const deployStatusSchema = z.object({
  service_id: z.string(),
  active: z.boolean(),
});

export const deployStatusResponseSchema = apiResponseSchema(deployStatusSchema);

export type DeployStatus = z.infer<typeof deployStatusSchema>;
