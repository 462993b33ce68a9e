import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { profileCompletionStatus } from '../domain/models';
import { serializeLinkedIdentity, serializeUser } from './serializers';

const NameSchema = z.string().min(1).max(100);

const UpdateProfileSchema = z
  .object({
    firstName: NameSchema.optional(),
    lastName: NameSchema.optional(),
  })
  .strict()
  .refine((body) => body.firstName !== undefined || body.lastName !== undefined, {
    message: 'Provide at least one field to update.',
  });

export const userRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get('/profile', async (request, reply) => {
    const user = await fastify.authenticate(request);

    return reply.code(200).send({
      data: { user: serializeUser(user) },
      meta: {},
    });
  });

  fastify.put(
    '/profile',
    fastify.withValidation({ body: UpdateProfileSchema }, async (request, reply) => {
      const user = await fastify.authenticate(request);
      const updated = await fastify.authService.updateProfile(user.id, request.validated.body);

      return reply.code(200).send({
        data: { user: serializeUser(updated) },
        meta: {},
      });
    }),
  );

  fastify.get('/profile/completion-status', async (request, reply) => {
    const user = await fastify.authenticate(request);

    return reply.code(200).send({
      data: profileCompletionStatus(user),
      meta: {},
    });
  });

  fastify.get('/oauth-accounts', async (request, reply) => {
    const user = await fastify.authenticate(request);
    const accounts = await fastify.authService.listLinkedIdentities(user.id);

    return reply.code(200).send({
      data: { accounts: accounts.map(serializeLinkedIdentity) },
      meta: { total: accounts.length },
    });
  });
};
