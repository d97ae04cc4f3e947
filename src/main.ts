import { createAppContext } from './app-context.js';
import { loadConfig } from './config/index.js';
import { createDatabaseClient, waitForDatabase, type PgDatabaseClient } from './db/client.js';
import { createLogger } from './logger.js';
import { buildServer } from './server/fastify.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);

  let db: PgDatabaseClient | null = null;
  if (config.DATABASE_URL) {
    db = createDatabaseClient(config.DATABASE_URL);
    await waitForDatabase(db, { logger: logger.child({ component: 'database' }) });
    if (config.AUTO_MIGRATE) {
      await db.migrate();
    }
  } else {
    logger.info('DATABASE_URL is not set; chat messages will not be persisted');
  }

  const ctx = createAppContext(config, { logger, db });
  const app = await buildServer(ctx);

  const address = await app.listen({ host: config.HOST, port: config.PORT });
  logger.info({ address, toolServers: ctx.services.registry.listServers().length }, 'chat assistant listening');

  const shutdown = async () => {
    logger.info('Shutting down');
    await app.close();
    await db?.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
