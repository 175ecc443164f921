/**
 * Device Metrics Routes
 *
 * Device-Side Endpoints:
 * - POST /api/v1/devices/:device_id/heartbeat - Device reports it is alive
 * - POST /api/v1/devices/:device_id/stats     - Device reports an upload duration
 *
 * Management Endpoints:
 * - GET  /api/v1/devices/:device_id/stats     - Uptime and average upload time
 */

import { Router, Request, Response, NextFunction } from 'express';
import { MetricsStore } from '../store/metrics-store';
import { isMetricsStoreError } from '../store/errors';
import { DeviceRegistry } from '../services/device-registry';
import { StatsResultsLog } from '../services/stats-results-log';
import { requireKnownDevice } from '../middleware/device-whitelist';
import {
  HeartbeatRequestSchema,
  UploadStatsRequestSchema,
  DeviceStatsResponse,
} from '../types/device-metrics';
import { formatDuration } from '../utils/duration';
import logger from '../utils/logger';

export interface DevicesRouterOptions {
  store: MetricsStore;
  registry: DeviceRegistry;
  resultsLog: StatsResultsLog;
  enforceWhitelist?: boolean;
}

export function createDevicesRouter(options: DevicesRouterOptions): Router {
  const { store, registry, resultsLog, enforceWhitelist = true } = options;
  const router = Router();

  router.use('/devices/:device_id', requireKnownDevice(registry, enforceWhitelist));

  /**
   * Record a heartbeat
   * POST /devices/:device_id/heartbeat
   * Body: { sent_at: ISO-8601 }
   */
  router.post('/devices/:device_id/heartbeat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = HeartbeatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ msg: 'invalid request body' });
        return;
      }

      await store.recordHeartbeat(req.params.device_id, parsed.data.sent_at);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * Record an upload duration
   * POST /devices/:device_id/stats
   * Body: { sent_at: ISO-8601, upload_time: nanoseconds }
   */
  router.post('/devices/:device_id/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = UploadStatsRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ msg: 'invalid request body' });
        return;
      }

      const { sent_at, upload_time } = parsed.data;
      await store.recordUpload(req.params.device_id, sent_at, upload_time);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * Get device stats
   * GET /devices/:device_id/stats
   */
  router.get('/devices/:device_id/stats', async (req: Request, res: Response, next: NextFunction) => {
    const deviceId = req.params.device_id;

    try {
      const stats = await store.getStats(deviceId);
      const body: DeviceStatsResponse = {
        avg_upload_time: formatDuration(stats.averageUploadNs),
        uptime: stats.uptime,
      };

      await resultsLog.record(deviceId, body.uptime, body.avg_upload_time);
      res.status(200).json(body);
    } catch (error) {
      if (isMetricsStoreError(error)) {
        logger.debug(`Stats unavailable for ${deviceId}: ${error.code}`);
        res.status(404).json({ msg: 'Device not found' });
        return;
      }
      next(error);
    }
  });

  return router;
}
