import { z } from 'zod';

// Success response envelope
export const successEnvelopeSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    ok: z.literal(true),
    data: dataSchema,
  });

// Error response envelope
export const errorEnvelopeSchema = z.object({
  ok: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.array(z.unknown()).optional(),
  }),
});

// Discriminated union for any response
export const apiResponseSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.discriminatedUnion('ok', [successEnvelopeSchema(dataSchema), errorEnvelopeSchema]);

// TypeScript types
export type SuccessEnvelope<T> = { ok: true; data: T };
export type ErrorEnvelope = {
  ok: false;
  error: { code: string; message: string; details?: unknown[] };
};
export type ApiResponse<T> = SuccessEnvelope<T> | ErrorEnvelope;
