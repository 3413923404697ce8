import { config } from './config/index.js';
import { buildApp } from './app.js';
import { checkDatabaseConnection, closeDatabaseConnection, db, runMigrations } from './db/index.js';
import {
  checkRedisConnection,
  cleanupSyncEngineIntegration,
  initializeSyncEngineIntegration,
} from './sync-integration.js';

const { engine } = initializeSyncEngineIntegration({ config, db });

const app = await buildApp(
  {
    checkDatabase: checkDatabaseConnection,
    checkRedis: checkRedisConnection,
    getEngineStatus: () => engine.getStatus(),
  },
  {
    production: config.NODE_ENV === 'production',
    logger: {
      level: config.NODE_ENV === 'production' ? 'info' : 'debug',
      transport:
        config.NODE_ENV !== 'production'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
              },
            }
          : undefined,
    },
  }
);

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  app.log.info(`Received ${signal}. Starting graceful shutdown...`);

  try {
    // Close HTTP server
    await app.close();
    app.log.info('HTTP server closed');

    // Stop agents; in-flight passes finish first
    await cleanupSyncEngineIntegration();
    app.log.info('Reconciliation engine stopped');

    // Close database connection
    await closeDatabaseConnection();
    app.log.info('Database connection closed');

    process.exit(0);
  } catch (error) {
    app.log.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
}

// Start worker
async function start(): Promise<void> {
  try {
    await runMigrations();
    await engine.start();
    app.log.info('Reconciliation engine started');

    const address = await app.listen({
      port: config.PORT,
      host: config.HOST,
    });

    app.log.info(`PackSync worker running at ${address}`);
    app.log.info(`Environment: ${config.NODE_ENV}`);

    // Register shutdown handlers
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start worker');
    await cleanupSyncEngineIntegration();
    await closeDatabaseConnection();
    process.exit(1);
  }
}

await start();
