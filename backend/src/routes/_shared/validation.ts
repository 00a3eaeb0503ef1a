import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ERROR_MESSAGES, errorResponse } from '../../util/error-messages.js';

export const cryptoIdSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(/^[a-z0-9][a-z0-9.-]{0,99}$/);

export const cryptoIdParams = z.object({ id: cryptoIdSchema }).strict();

export function parseRequestParams<S extends z.ZodTypeAny>(
  schema: S,
  req: FastifyRequest,
  reply: FastifyReply,
): z.infer<S> | undefined {
  const result = schema.safeParse(req.params);
  if (!result.success) {
    req.log.warn({ issues: result.error.issues }, 'invalid path parameter');
    reply.code(400).send(errorResponse(ERROR_MESSAGES.invalidParams));
    return undefined;
  }
  return result.data;
}

export function parseRequestQuery<S extends z.ZodTypeAny>(
  schema: S,
  req: FastifyRequest,
  reply: FastifyReply,
  message: string = ERROR_MESSAGES.invalidQuery,
): z.infer<S> | undefined {
  const result = schema.safeParse(req.query ?? {});
  if (!result.success) {
    req.log.warn({ issues: result.error.issues }, 'invalid query');
    reply.code(400).send(errorResponse(message));
    return undefined;
  }
  return result.data;
}
