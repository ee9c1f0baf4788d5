import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { registerPlugins, DOCS_PREFIX } from './plugins.js';
import { registerHooks } from './hooks.js';
import { errorHandler } from '@shared/middleware/error.middleware.js';
import { logger } from '@shared/utils/logger.js';
import type { Database } from '@/database/types.js';
import { eventsRoutes } from '@modules/events/index.js';
import { attendeesRoutes } from '@modules/attendees/index.js';
import { venuesRoutes } from '@modules/venues/index.js';
import { bookingsRoutes } from '@modules/bookings/index.js';
import { mediaRoutes } from '@modules/media/index.js';
import type { AppInstance } from '@shared/types/fastify.js';

export interface BuildServerOptions {
  database: Database;
}

export async function buildServer({ database }: BuildServerOptions): Promise<AppInstance> {
  const app = Fastify({
    loggerInstance: logger,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.decorate('db', database);

  // Global error handler
  app.setErrorHandler(errorHandler);

  // Register plugins (CORS, Helmet, Rate Limit, Multipart, Docs)
  await registerPlugins(app);

  // Register lifecycle hooks
  registerHooks(app);

  app.get('/', { schema: { hide: true } }, async (_request, reply) => {
    return reply.redirect(DOCS_PREFIX);
  });

  // Health check with database connectivity
  app.get('/health', { schema: { hide: true } }, async (_request, reply) => {
    const checks: Record<string, 'connected' | 'disconnected'> = {
      database: 'disconnected',
    };

    try {
      await app.db.ping();
      checks.database = 'connected';
    } catch (err) {
      app.log.warn({ err }, 'Database ping failed');
    }

    const allHealthy = Object.values(checks).every((v) => v === 'connected');
    const status = allHealthy ? 'ok' : 'degraded';
    const statusCode = allHealthy ? 200 : 503;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  // Register module routes
  await app.register(eventsRoutes, { prefix: '/events' });
  await app.register(attendeesRoutes, { prefix: '/attendees' });
  await app.register(venuesRoutes, { prefix: '/venues' });
  await app.register(bookingsRoutes, { prefix: '/bookings' });
  await app.register(mediaRoutes);

  return app;
}
