/**
 * Metrics Store Errors
 */

export type MetricsStoreErrorCode = 'DEVICE_NOT_FOUND' | 'NO_HEARTBEATS';

export class MetricsStoreError extends Error {
  constructor(
    message: string,
    public readonly code: MetricsStoreErrorCode,
    public readonly deviceId: string
  ) {
    super(message);
    this.name = 'MetricsStoreError';
  }
}

export class DeviceNotFoundError extends MetricsStoreError {
  constructor(deviceId: string) {
    super(`Device not found: ${deviceId}`, 'DEVICE_NOT_FOUND', deviceId);
    this.name = 'DeviceNotFoundError';
  }
}

export class NoHeartbeatsError extends MetricsStoreError {
  constructor(deviceId: string) {
    super(`No heartbeats recorded for device: ${deviceId}`, 'NO_HEARTBEATS', deviceId);
    this.name = 'NoHeartbeatsError';
  }
}

export function isMetricsStoreError(error: unknown): error is MetricsStoreError {
  return error instanceof MetricsStoreError;
}
