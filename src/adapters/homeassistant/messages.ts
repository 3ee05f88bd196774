import { z } from 'zod';

const errorSchema = z
  .object({
    code: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export const authMessageSchema = z.object({
  type: z.enum(['auth_required', 'auth_ok', 'auth_invalid']),
  message: z.string().optional(),
  ha_version: z.string().optional(),
});

export const resultMessageSchema = z.object({
  id: z.number(),
  type: z.literal('result'),
  success: z.boolean(),
  result: z.unknown().optional(),
  error: errorSchema.optional(),
});

export const eventMessageSchema = z.object({
  id: z.number(),
  type: z.literal('event'),
  event: z
    .object({
      event_type: z.string().optional(),
      data: z.record(z.unknown()).default({}),
    })
    .passthrough(),
});

export const pongMessageSchema = z.object({
  id: z.number(),
  type: z.literal('pong'),
});

export const incomingMessageSchema = z.union([
  authMessageSchema,
  resultMessageSchema,
  eventMessageSchema,
  pongMessageSchema,
]);

export type IncomingMessage = z.infer<typeof incomingMessageSchema>;

export function describeError(error: z.infer<typeof errorSchema> | undefined): string {
  if (!error) {
    return 'unknown error';
  }
  const code = error.code ?? 'error';
  return error.message ? `${code}: ${error.message}` : code;
}
