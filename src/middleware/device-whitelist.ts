/**
 * Device whitelist middleware
 * Rejects requests for device IDs that are not in the registry.
 * Can be switched off via ENFORCE_DEVICE_WHITELIST=false
 */

import type { Request, Response, NextFunction } from 'express';
import { DeviceRegistry } from '../services/device-registry';
import logger from '../utils/logger';

export function requireKnownDevice(registry: DeviceRegistry, enforce = true) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!enforce) {
      return next();
    }

    const deviceId = req.params.device_id;
    if (!deviceId || !registry.isKnown(deviceId)) {
      logger.warn(`Rejected request for unknown device: ${deviceId}`);
      res.status(404).json({ msg: 'device not found' });
      return;
    }

    next();
  };
}
