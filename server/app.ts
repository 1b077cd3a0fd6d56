import cors from 'cors';
import express, { type Express } from 'express';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createHealthRouter } from './routes/health.js';
import { createMetricsRouter } from './routes/metrics.js';
import { createNetworkRouter } from './routes/network.js';
import { createReportsRouter } from './routes/reports.js';
import type { ServerSettings } from './services/settings.js';
import type { SimulationSession } from './services/simulationSession.js';

export function createApp(session: SimulationSession, settings: ServerSettings): Express {
  const app = express();
  app.use(cors({ origin: settings.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use('/network', createNetworkRouter({ session }));
  app.use('/reports', createReportsRouter({ session, reportPath: settings.reportPath }));
  app.use('/metrics', createMetricsRouter({ session, prometheusEnabled: settings.prometheusEnabled }));
  app.use('/health', createHealthRouter({ session, prometheusEnabled: settings.prometheusEnabled }));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
