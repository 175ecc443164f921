/**
 * Fleet Metrics Server
 * Collects device heartbeats and upload durations, serves uptime stats
 */

import 'dotenv/config';
import { Server } from 'http';
import { createApp } from './app';
import { loadServerConfig } from './config/server-config';
import { MetricsStore } from './store/metrics-store';
import { DeviceRegistry } from './services/device-registry';
import { StatsResultsLog } from './services/stats-results-log';
import logger from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function start(): Promise<Server> {
  const config = loadServerConfig();
  logger.level = config.logLevel;

  logger.info('Starting Fleet Metrics Server...');

  const store = new MetricsStore();
  const registry = new DeviceRegistry(store);
  await registry.loadFromFile(config.devicesFile);

  if (!config.enforceDeviceWhitelist) {
    logger.warn('Device whitelist enforcement disabled - unknown devices will be accepted');
  }

  const resultsLog = new StatsResultsLog({
    filePath: config.resultsFile,
    enabled: config.resultsLogEnabled,
  });

  const app = createApp({
    store,
    registry,
    resultsLog,
    apiBase: config.apiBase,
    enforceWhitelist: config.enforceDeviceWhitelist,
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      logger.info(`Server listening on http://${config.host}:${config.port}`);
      logger.info(`   API: http://${config.host}:${config.port}${config.apiBase}`);
      logger.info(`   Health: http://${config.host}:${config.port}/health`);
      resolve(server);
    });
    server.on('error', reject);
  });
}

function registerShutdown(server: Server): void {
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);

    // Force close if shutdown hangs
    const forceCloseTimeout = setTimeout(() => {
      logger.warn('Forcefully closing server after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceCloseTimeout.unref();

    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', { error: error.message });
        process.exit(1);
      }
      logger.info('Server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start()
  .then(registerShutdown)
  .catch((error: unknown) => {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  });
