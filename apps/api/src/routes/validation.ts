import type { FastifyReply } from 'fastify';
import { z } from 'zod';

/**
 * Parse a request body with zod, or answer 400 with the failing fields.
 */
export function parseOrReply400<T extends z.ZodTypeAny>(
  reply: FastifyReply,
  schema: T,
  input: unknown,
  errorMessage: string = 'Invalid request',
): z.infer<T> | null {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    reply.status(400).send({
      error: errorMessage,
      details: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
    return null;
  }
  return parsed.data;
}
