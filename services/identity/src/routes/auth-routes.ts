import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import type { Env } from '../env';
import { badRequest } from '../errors';
import { createCredentialSchemas } from '../lib/credential-policy';
import { serializeSession } from './serializers';

export interface AuthRoutesOptions {
  env: Pick<Env, 'MIN_USERNAME_LENGTH' | 'MIN_PASSWORD_LENGTH'>;
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify, opts) => {
  const credentials = createCredentialSchemas({
    minUsernameLength: opts.env.MIN_USERNAME_LENGTH,
    minPasswordLength: opts.env.MIN_PASSWORD_LENGTH,
  });

  const RegisterSchema = z
    .object({
      username: credentials.username,
      email: z.string().email().max(255),
      password: credentials.password,
      firstName: z.string().min(1).max(100).optional(),
      lastName: z.string().min(1).max(100).optional(),
    })
    .strict();

  const LoginSchema = z
    .object({
      identifier: z.string().min(1).max(255),
      password: z.string().min(1).max(128),
    })
    .strict();

  const OAuthLoginSchema = z
    .object({
      provider: z.string().min(1).max(50),
      token: z.string().min(1),
    })
    .strict();

  fastify.post(
    '/register',
    fastify.withValidation({ body: RegisterSchema }, async (request, reply) => {
      const session = await fastify.authService.register(request.validated.body);

      return reply.code(201).send({
        data: serializeSession(session),
        meta: {},
      });
    }),
  );

  fastify.post(
    '/login',
    fastify.withValidation({ body: LoginSchema }, async (request, reply) => {
      const session = await fastify.authService.login(request.validated.body);

      return reply.code(200).send({
        data: serializeSession(session),
        meta: {},
      });
    }),
  );

  fastify.post(
    '/oauth/login',
    fastify.withValidation({ body: OAuthLoginSchema }, async (request, reply) => {
      const { provider, token } = request.validated.body;
      const result = await fastify.authService.loginWithProvider(provider, token);

      if (!result) {
        throw badRequest('AUTH_OAUTH_FAILED', 'Invalid OAuth token or provider not supported.');
      }

      request.log.info({ provider, userId: result.user.id, outcome: result.outcome }, 'OAuth login');

      return reply.code(200).send({
        data: serializeSession(result),
        meta: { outcome: result.outcome },
      });
    }),
  );

  fastify.get('/oauth/providers', async (_request, reply) => {
    return reply.code(200).send({
      data: { providers: fastify.authService.listProviders() },
      meta: {},
    });
  });

  // Sessions are stateless; the client discards its token.
  fastify.post('/logout', async (_request, reply) => {
    return reply.code(200).send({
      data: { message: 'Logged out.' },
      meta: {},
    });
  });
};
