import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError, z, type ZodTypeAny } from 'zod';

const SEGMENTS = ['body', 'query', 'params'] as const;

type ValidationSegment = (typeof SEGMENTS)[number];

export type ValidationSchemas = Partial<Record<ValidationSegment, ZodTypeAny>>;

export type ValidatedData<T extends ValidationSchemas> = {
  readonly [K in keyof T]: T[K] extends ZodTypeAny ? z.infer<T[K]> : never;
};

export type ValidationHandler<T extends ValidationSchemas> = (
  request: FastifyRequest & { readonly validated: ValidatedData<T> },
  reply: FastifyReply,
) => unknown | Promise<unknown>;

const validationPlugin = async (fastify: FastifyInstance) => {
  fastify.decorateRequest('validated', null);

  fastify.decorate('withValidation', function withValidation<
    T extends ValidationSchemas,
  >(schemas: T, handler: ValidationHandler<T>) {
    return async function wrappedHandler(request: FastifyRequest, reply: FastifyReply) {
      const validated: Partial<Record<ValidationSegment, unknown>> = {};

      try {
        for (const segment of SEGMENTS) {
          const schema = schemas[segment];
          if (schema) {
            validated[segment] = schema.parse(sanitize(request[segment] ?? {}));
          }
        }
      } catch (error) {
        if (error instanceof ZodError) {
          return reply.code(422).send({
            error: {
              code: 'VALIDATION_ERROR',
              message: 'Request validation failed.',
              details: error.issues.map((issue) => ({
                path: issue.path.length ? issue.path.join('.') : 'root',
                message: issue.message,
                code: issue.code,
              })),
            },
            correlationId: request.id,
          });
        }

        throw error;
      }

      request.validated = validated;
      return handler(request as FastifyRequest & { readonly validated: ValidatedData<T> }, reply);
    };
  });
};

/** Strips control characters and surrounding whitespace from every string. */
function sanitize(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '').trim();
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Date || Buffer.isBuffer(value)) {
    return value;
  }

  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, sanitize(item)]));
}

export default fp(validationPlugin, {
  name: 'validation-plugin',
});
