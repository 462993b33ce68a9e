import fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import sensible from '@fastify/sensible';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import { env as defaultEnv, type Env } from './env';
import { ServiceError } from './errors';
import { PasswordHasher } from './lib/password-hasher';
import { SessionTokenCodec } from './lib/session-token';
import { createProviderRegistry, type OAuthProviderRegistry } from './oauth/provider-registry';
import authzPlugin from './plugins/authz';
import databasePlugin from './plugins/database';
import validationPlugin from './plugins/validation';
import { DrizzleIdentityRepository } from './repositories/drizzle-identity-repository';
import type { IdentityRepository } from './repositories/identity-repository';
import { authRoutes } from './routes/auth-routes';
import { healthRoutes } from './routes/health-routes';
import { userRoutes } from './routes/user-routes';
import { AccountLinkingService } from './services/account-linking-service';
import { AuthService } from './services/auth-service';

export interface BuildAppOptions {
  env?: Env;
  /** Skips the Postgres plugin when supplied. */
  repository?: IdentityRepository;
  providers?: OAuthProviderRegistry;
  clock?: () => number;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(options: BuildAppOptions = {}) {
  const resolvedEnv = options.env ?? defaultEnv;

  const app = fastify({
    logger: options.logger ?? { level: resolvedEnv.LOG_LEVEL },
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: true,
  });
  await app.register(helmet);
  await app.register(rateLimit, {
    max: resolvedEnv.RATE_LIMIT_MAX,
    timeWindow: `${resolvedEnv.RATE_LIMIT_WINDOW_MINUTES} minutes`,
  });

  let repository = options.repository;
  if (!repository) {
    await app.register(databasePlugin, { connectionString: resolvedEnv.DATABASE_URL });
    repository = new DrizzleIdentityRepository(app.db);
  }

  const tokens = new SessionTokenCodec({
    secret: resolvedEnv.JWT_SECRET,
    defaultTtlMinutes: resolvedEnv.ACCESS_TOKEN_EXPIRE_MINUTES,
    issuer: resolvedEnv.JWT_ISSUER,
    audience: resolvedEnv.JWT_AUDIENCE,
    clock: options.clock,
  });
  const providers = options.providers ?? createProviderRegistry(resolvedEnv);
  const linking = new AccountLinkingService({
    repository,
    providers,
    tokens,
    logger: app.log,
    usernameMaxAttempts: resolvedEnv.USERNAME_MAX_ATTEMPTS,
    maxLinkAttempts: resolvedEnv.OAUTH_LINK_MAX_ATTEMPTS,
  });
  const authService = new AuthService({
    repository,
    env: resolvedEnv,
    hasher: new PasswordHasher({ timeCost: resolvedEnv.PASSWORD_HASH_TIME_COST }),
    tokens,
    providers,
    linking,
  });

  app.decorate('sessionTokens', tokens);
  app.decorate('authService', authService);

  await app.register(validationPlugin);
  await app.register(authzPlugin);
  await app.register(healthRoutes);
  await app.register(authRoutes, { prefix: '/api/v1/auth', env: resolvedEnv });
  await app.register(userRoutes, { prefix: '/api/v1/user' });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ServiceError) {
      request.log.warn({ err: error }, 'Handled service error');
      return reply.code(error.status).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
        correlationId: request.id,
      });
    }

    // Framework errors such as malformed JSON or rate limiting carry their own 4xx.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.info({ err: error }, 'Rejected request');
      return reply.code(error.statusCode).send({
        error: {
          code: error.code ?? 'BAD_REQUEST',
          message: error.message,
          details: null,
        },
        correlationId: request.id,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred.',
      },
      correlationId: request.id,
    });
  });

  return app;
}
