/**
 * Express application wiring
 */

import express, { Express } from 'express';
import cors from 'cors';
import { MetricsStore } from './store/metrics-store';
import { DeviceRegistry } from './services/device-registry';
import { StatsResultsLog } from './services/stats-results-log';
import { createDevicesRouter } from './routes/devices';
import { requestLogger } from './middleware/request-logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';

export interface AppDependencies {
  store: MetricsStore;
  registry: DeviceRegistry;
  resultsLog: StatsResultsLog;
  apiBase?: string;
  enforceWhitelist?: boolean;
}

export function createApp(deps: AppDependencies): Express {
  const { store, registry, resultsLog, apiBase = '/api/v1', enforceWhitelist = true } = deps;
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      devices: store.deviceCount
    });
  });

  app.use(apiBase, createDevicesRouter({ store, registry, resultsLog, enforceWhitelist }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
