import pino from 'pino';
import { config } from '@config/app.config.js';

/**
 * Process-wide logger, also handed to Fastify so request logs share it.
 */
export const logger = pino({
  name: 'event-records-api',
  level: config.LOG_LEVEL ?? (config.isDevelopment ? 'debug' : 'info'),
  transport: config.isDevelopment
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } }
    : undefined,
  serializers: { err: pino.stdSerializers.err },
  redact: ['req.headers.authorization', 'req.headers.cookie'],
});
