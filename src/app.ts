import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { errorHandler } from './middleware/errorHandler';
import { createAppointmentRoutes } from './routes/appointment.routes';
import { AppointmentService } from './services/appointment.service';
import { AvailabilityService } from './services/availability.service';
import { TimeGrid } from './services/scheduling/timeGrid';
import { AppointmentStore } from './services/store/appointment.store';

export interface AppOptions {
  store: AppointmentStore;
  grid: TimeGrid;
  checkHealth: () => Promise<{ status: string; error?: string }>;
  clock?: () => Date;
  reportErrors?: boolean;
}

export function createApp(options: AppOptions): Express {
  const { store, grid } = options;
  const appointments = new AppointmentService(store, grid);
  const availability = new AvailabilityService(grid, store);

  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Routes
  app.use('/api/appointments', createAppointmentRoutes({ appointments, availability, grid, clock: options.clock }));

  // Health check
  app.get('/health', async (_req, res, next) => {
    try {
      const database = await options.checkHealth();
      const healthy = database.status === 'healthy';
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'healthy' : 'degraded',
        database,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  // Error handler
  if (options.reportErrors) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
