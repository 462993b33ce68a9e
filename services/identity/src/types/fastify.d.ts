import type { FastifyRequest, RouteHandlerMethod } from 'fastify';

import type { IdentityUser } from '../domain/models';
import type { SessionTokenCodec } from '../lib/session-token';
import type { ValidationHandler, ValidationSchemas } from '../plugins/validation';
import type { IdentityDatabase } from '../repositories/drizzle-identity-repository';
import type { AuthService } from '../services/auth-service';

declare module 'fastify' {
  interface FastifyInstance {
    db: IdentityDatabase;
    authService: AuthService;
    sessionTokens: SessionTokenCodec;
    withValidation<T extends ValidationSchemas>(
      schemas: T,
      handler: ValidationHandler<T>,
    ): RouteHandlerMethod;
    authenticate(request: FastifyRequest): Promise<IdentityUser>;
  }

  interface FastifyRequest {
    validated: Record<string, unknown>;
  }
}
