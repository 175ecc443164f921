/**
 * Metrics Store
 * In-memory directory of per-device state.
 *
 * Locking is per device: the directory lookup is a single synchronous
 * Map access, and every read or write then goes through that device's own
 * read/write lock. Nothing holds a lock across devices.
 */

import { DeviceState, DeviceSnapshot } from './device-state';
import { DeviceNotFoundError, NoHeartbeatsError } from './errors';

export interface DeviceStats {
  /** Percentage in [0, 100] */
  uptime: number;
  /** Average upload duration in nanoseconds, 0 when nothing was uploaded */
  averageUploadNs: number;
}

export interface MetricsStoreOptions {
  /** Builds the state for a newly seen device */
  createDeviceState?: (deviceId: string) => DeviceState;
}

export class MetricsStore {
  private readonly devices = new Map<string, DeviceState>();
  private readonly createDeviceState: (deviceId: string) => DeviceState;

  constructor(options: MetricsStoreOptions = {}) {
    this.createDeviceState = options.createDeviceState ?? ((deviceId) => new DeviceState(deviceId));
  }

  /**
   * Ensure state exists for a device. Existing history is kept.
   */
  registerDevice(deviceId: string): void {
    this.getOrCreateDevice(deviceId);
  }

  hasDevice(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  get deviceCount(): number {
    return this.devices.size;
  }

  recordHeartbeat(deviceId: string, sentAt: Date | bigint): Promise<void> {
    return this.getOrCreateDevice(deviceId).addHeartbeat(sentAt);
  }

  /**
   * Record an upload. sentAt is accepted alongside the duration but only
   * the duration feeds the average. Non-finite durations are ignored.
   */
  recordUpload(deviceId: string, sentAt: Date | bigint, durationNs: number | bigint): Promise<void> {
    return this.getOrCreateDevice(deviceId).addUpload(durationNs);
  }

  /**
   * @throws DeviceNotFoundError when the device has no state
   * @throws NoHeartbeatsError when the device never sent a heartbeat
   */
  async getStats(deviceId: string): Promise<DeviceStats> {
    const device = this.devices.get(deviceId);
    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }

    const { uptime, averageUploadNs } = await device.readMetrics();
    if (uptime === undefined) {
      throw new NoHeartbeatsError(deviceId);
    }

    return { uptime, averageUploadNs };
  }

  async getSnapshot(deviceId: string): Promise<DeviceSnapshot | null> {
    const device = this.devices.get(deviceId);
    return device ? device.snapshot() : null;
  }

  private getOrCreateDevice(deviceId: string): DeviceState {
    const existing = this.devices.get(deviceId);
    if (existing) {
      return existing;
    }

    const created = this.createDeviceState(deviceId);
    this.devices.set(deviceId, created);
    return created;
  }
}
