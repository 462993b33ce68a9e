import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import * as schema from '../db/schema';

export interface DatabasePluginOptions {
  connectionString: string;
}

const databasePlugin: FastifyPluginAsync<DatabasePluginOptions> = async (fastify, opts) => {
  const pool = new Pool({ connectionString: opts.connectionString });

  pool.on('error', (error) => {
    fastify.log.error({ err: error }, 'Idle database client failed');
  });

  fastify.decorate('db', drizzle(pool, { schema }));

  fastify.addHook('onClose', async () => {
    await pool.end();
  });
};

export default fp(databasePlugin, {
  name: 'database-plugin',
});
