import type { FastifyInstance } from 'fastify';
import type { Database } from '@/database/types.js';
import { logger } from '@shared/utils/logger.js';

export function gracefulShutdown(server: FastifyInstance, database: Database) {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  let shuttingDown = false;

  signals.forEach((signal) => {
    process.on(signal, () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);

      void (async () => {
        try {
          await server.close();
        } finally {
          await database.close();
        }

        logger.info('Server closed');
        process.exit(0);
      })().catch((err: unknown) => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
    });
  });
}
