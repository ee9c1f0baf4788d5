import { buildServer } from '@core/server.js';
import { config } from '@config/app.config.js';
import { connectDatabase } from '@/database/client.js';
import { logger } from '@shared/utils/logger.js';
import { gracefulShutdown } from '@core/shutdown.js';

async function main() {
  const database = await connectDatabase(config.database);
  logger.info(`Connected to MongoDB database ${config.database.name}`);

  try {
    const server = await buildServer({ database });

    await server.listen({ port: config.PORT, host: config.HOST });
    logger.info(`Server running on port ${config.PORT}`);

    gracefulShutdown(server, database);
  } catch (err) {
    await database.close();
    throw err;
  }
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start server');
  process.exit(1);
});
