import type { FastifyPluginAsync } from 'fastify';

import packageJson from '../../package.json';

export const healthRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: packageJson.version,
    providers: fastify.authService.enabledProviders(),
  }));
};
