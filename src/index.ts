import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { checkDatabaseHealth, pool } from './config/database';
import { buildScheduleConfig } from './config/schedule';
import { createApp } from './app';
import { TimeGrid } from './services/scheduling/timeGrid';
import { PostgresAppointmentStore } from './services/store/postgres.store';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

async function start() {
  try {
    const grid = new TimeGrid(buildScheduleConfig(env));
    logger.info('Schedule loaded', {
      timezone: grid.timezone,
      slotMinutes: grid.slotMinutes,
      open: env.BUSINESS_OPEN,
      close: env.BUSINESS_CLOSE,
      days: env.BUSINESS_DAYS,
    });

    const database = await checkDatabaseHealth();
    if (database.status !== 'healthy') {
      throw new Error(`Database unavailable: ${database.error ?? 'unknown error'}`);
    }
    logger.info('Database connected');

    const app = createApp({
      store: new PostgresAppointmentStore(),
      grid,
      checkHealth: checkDatabaseHealth,
      reportErrors: Boolean(env.SENTRY_DSN),
    });

    const server = app.listen(parseInt(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });

    const shutdown = (signal: string) => {
      logger.info('Shutting down', { signal });
      server.close(() => {
        pool.end().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error('Failed to close database pool', { error: errorMessage(err) });
            process.exit(1);
          }
        );
      });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void start();
