import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { jsonSchemaTransform } from 'fastify-type-provider-zod';
import { config } from '@config/app.config.js';
import type { AppInstance } from '@shared/types/fastify.js';

export const DOCS_PREFIX = '/docs';

export async function registerPlugins(app: AppInstance) {
  // Sensible defaults and HTTP error utilities
  await app.register(sensible, {
    sharedSchemaId: 'HttpError',
  });

  await app.register(cors, {
    origin: config.CORS_ORIGIN,
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: config.isProduction,
  });

  await app.register(rateLimit, {
    max: config.security.rateLimit.max,
    timeWindow: config.security.rateLimit.timeWindow,
  });

  // Uploads are held in memory whole; no per-file cap.
  await app.register(multipart, {
    limits: { fileSize: Number.POSITIVE_INFINITY },
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Event Records API',
        description: 'Events, attendees, venues, bookings and their media',
        version: '1.0.0',
      },
    },
    transform: jsonSchemaTransform,
  });

  await app.register(swaggerUi, {
    routePrefix: DOCS_PREFIX,
    staticCSP: config.isProduction,
  });
}
