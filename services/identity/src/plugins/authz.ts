import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';

import { unauthorized } from '../errors';

function extractBearerToken(request: FastifyRequest) {
  const header = request.headers.authorization;
  if (typeof header !== 'string') {
    return null;
  }

  const match = /^Bearer\s+(.+)$/i.exec(header);
  return match ? match[1].trim() : null;
}

function invalidToken() {
  return unauthorized('AUTH_INVALID_TOKEN', 'Invalid token.');
}

/**
 * Bearer authentication. A missing, malformed, expired or orphaned token all
 * produce the same 401.
 */
const authzPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorate('authenticate', async function authenticate(request: FastifyRequest) {
    const token = extractBearerToken(request);
    if (!token) {
      throw invalidToken();
    }

    const subject = fastify.sessionTokens.verify(token);
    if (!subject) {
      throw invalidToken();
    }

    const user = await fastify.authService.getUserById(subject);
    if (!user) {
      throw invalidToken();
    }

    return user;
  });
};

export default fp(authzPlugin, {
  name: 'authz-plugin',
});
