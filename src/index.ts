import http from 'http';
import type { Pool } from 'pg';
import { createApp } from './app';
import { config, validateConfig } from './config/env';
import { applySchema, createPool } from './config/database';
import { loadTranslator } from './i18n/translator';
import { rolePermissionFactory } from './middleware/permission.middleware';
import { PgRecordsStore } from './records/records.store';
import { EjsTemplateRenderer } from './templates/renderer';
import { logger } from './utils/logger';

// Retry database connection
const connectWithRetry = async (pool: Pool, retries = 5, delay = 2000): Promise<boolean> => {
  const dbUrl = config.database.url;
  const dbHost = dbUrl.includes('@') ? dbUrl.split('@')[1]?.split('/')[0] : 'unknown';

  logger.info(`Connecting to database at: ${dbHost}`);

  for (let i = 0; i < retries; i++) {
    try {
      await pool.query('SELECT 1');
      logger.info('Database connected successfully');
      return true;
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`Database connection failed (attempt ${i + 1}/${retries}): ${errorMsg}`);
      if (i < retries - 1) {
        await new Promise((res) => setTimeout(res, delay));
      }
    }
  }
  return false;
};

async function startServer() {
  validateConfig();

  const pool = createPool();

  if (!(await connectWithRetry(pool))) {
    logger.error('Could not connect to Database after multiple attempts. Check DATABASE_URL and that Postgres is running.');
    process.exit(1);
  }

  await applySchema(pool);

  const records = new PgRecordsStore(pool);
  const translator = await loadTranslator(config.i18n.localesDir);

  const app = createApp({
    records,
    translator,
    renderer: new EjsTemplateRenderer(config.itemTypes.templatesDir),
    permissionFactory: rolePermissionFactory(config.permissions.adminRoles),
    templates: config.itemTypes.templates,
    nodeEnv: config.nodeEnv,
    accessSecret: config.jwt.accessSecret,
    defaultLocale: config.i18n.defaultLocale,
    urlPrefix: config.itemTypes.urlPrefix,
    corsOrigin: config.cors.origin,
    rateLimit: config.rateLimit,
  });

  const server = http.createServer(app);

  server.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info(`Item types: http://localhost:${config.port}${config.itemTypes.urlPrefix}`);
  });

  // Graceful shutdown
  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');

      records
        .close()
        .then(() => {
          logger.info('Database disconnected');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
