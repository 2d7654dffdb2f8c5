import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import { sql } from 'drizzle-orm';
import type { ApiErrorResponse } from '@timekeep/shared';
import configPlugin, { loadConfig } from './plugins/config.js';
import dbPlugin from './plugins/db.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import timeEntryRoutes from './routes/timeEntries.js';
import categoryRoutes from './routes/categories.js';
import tagRoutes from './routes/tags.js';
import reportRoutes from './routes/reports.js';
import csvRoutes from './routes/csv.js';

export async function buildApp(): Promise<FastifyInstance> {
  // Fail fast on bad configuration, before the logger exists
  const config = loadConfig(process.env);

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
    trustProxy: config.trustProxy,
  });

  // Configuration (must be first)
  await app.register(configPlugin, { config });

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // Database connection & migrations
  await app.register(dbPlugin);

  // Time entry routes (timer lifecycle + CRUD)
  await app.register(timeEntryRoutes, { prefix: '/api/time-entries' });

  // Category routes
  await app.register(categoryRoutes, { prefix: '/api/categories' });

  // Tag routes (read-only, tags are derived from descriptions)
  await app.register(tagRoutes, { prefix: '/api/tags' });

  // Report routes
  await app.register(reportRoutes, { prefix: '/api/reports' });

  // CSV export / import / preview
  await app.register(csvRoutes, { prefix: '/api/csv' });

  // Health check endpoint (liveness)
  app.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Readiness check: verifies the database is accessible
  app.get('/api/health/ready', async () => {
    app.db.run(sql`SELECT 1`);
    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = {
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(response);
  });

  return app;
}
