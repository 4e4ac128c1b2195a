/**
 * Session state model
 *
 * The only durable entity. It lives in a cookie held by the browser and is
 * rebuilt at the top of every request.
 */

import { z } from 'zod';

/** `owner/name` */
const NwoSchema = z.string().regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/);

export const LoginStateSchema = z.object({
  /** GitHub user access token */
  github: z.string().min(1).optional(),
  /** Fastly API token */
  fastly: z.string().min(1).optional(),
});

export const DeploymentStateSchema = z.object({
  src: NwoSchema.optional(),
  dest: NwoSchema.optional(),
  serviceId: z.string().min(1).optional(),
  domain: z.string().min(1).optional(),
});

export const SessionStateSchema = z.object({
  login: LoginStateSchema,
  deployment: DeploymentStateSchema,
});

export type LoginState = z.infer<typeof LoginStateSchema>;
export type DeploymentState = z.infer<typeof DeploymentStateSchema>;
export type SessionState = z.infer<typeof SessionStateSchema>;

export type Provider = keyof LoginState;

export function isProvider(value: string): value is Provider {
  return value === 'github' || value === 'fastly';
}

export function isNwo(value: string): boolean {
  return NwoSchema.safeParse(value).success;
}

export function emptySessionState(): SessionState {
  return { login: {}, deployment: {} };
}
