/**
 * Device State
 * Heartbeat and upload history for a single device.
 *
 * Uptime assumes one heartbeat per minute:
 *   uptime = distinctHeartbeats / wholeMinutesBetweenFirstAndLast * 100
 * capped at 100. When first and last fall inside the same minute the device
 * gets full credit (100).
 *
 * Instants are epoch nanoseconds, durations are nanoseconds.
 */

import { ReadWriteLock } from '../lib/rw-lock';
import { toEpochNanos } from '../utils/timestamp';

const NS_PER_MINUTE = 60_000_000_000n;

export interface DeviceMetrics {
  /** undefined until the first heartbeat */
  uptime: number | undefined;
  averageUploadNs: number;
}

export interface DeviceSnapshot {
  deviceId: string;
  heartbeatCount: number;
  uploadCount: number;
  firstHeartbeatNs: bigint | null;
  lastHeartbeatNs: bigint | null;
}

export class DeviceState {
  private readonly heartbeatTimestamps = new Set<bigint>();
  private readonly uploadDurations: bigint[] = [];
  private firstHeartbeat: bigint | null = null;
  private lastHeartbeat: bigint | null = null;

  constructor(
    public readonly deviceId: string,
    private readonly lock: ReadWriteLock = new ReadWriteLock()
  ) {}

  /**
   * Record a heartbeat. An invalid Date is ignored.
   */
  addHeartbeat(sentAt: Date | bigint): Promise<void> {
    const instant = toEpochNanos(sentAt);
    if (instant === null) {
      return Promise.resolve();
    }

    return this.lock.withWrite(() => {
      this.heartbeatTimestamps.add(instant);

      if (this.firstHeartbeat === null || instant < this.firstHeartbeat) {
        this.firstHeartbeat = instant;
      }
      if (this.lastHeartbeat === null || instant > this.lastHeartbeat) {
        this.lastHeartbeat = instant;
      }
    });
  }

  /**
   * Append an upload duration. Fractions are dropped; NaN and Infinity are ignored.
   */
  addUpload(durationNs: number | bigint): Promise<void> {
    if (typeof durationNs === 'number' && !Number.isFinite(durationNs)) {
      return Promise.resolve();
    }
    const sample = typeof durationNs === 'bigint' ? durationNs : BigInt(Math.trunc(durationNs));

    return this.lock.withWrite(() => {
      this.uploadDurations.push(sample);
    });
  }

  computeUptime(): Promise<number | undefined> {
    return this.lock.withRead(() => this.uptime());
  }

  computeAverageUpload(): Promise<number> {
    return this.lock.withRead(() => this.averageUpload());
  }

  /**
   * Both metrics from a single read, so no write lands between them
   */
  readMetrics(): Promise<DeviceMetrics> {
    return this.lock.withRead(() => ({
      uptime: this.uptime(),
      averageUploadNs: this.averageUpload(),
    }));
  }

  snapshot(): Promise<DeviceSnapshot> {
    return this.lock.withRead(() => ({
      deviceId: this.deviceId,
      heartbeatCount: this.heartbeatTimestamps.size,
      uploadCount: this.uploadDurations.length,
      firstHeartbeatNs: this.firstHeartbeat,
      lastHeartbeatNs: this.lastHeartbeat,
    }));
  }

  private uptime(): number | undefined {
    if (this.firstHeartbeat === null || this.lastHeartbeat === null) {
      return undefined;
    }

    // bigint division truncates: whole minutes only
    const elapsedMinutes = Number((this.lastHeartbeat - this.firstHeartbeat) / NS_PER_MINUTE);
    if (elapsedMinutes === 0) {
      return 100;
    }

    const uptime = (this.heartbeatTimestamps.size / elapsedMinutes) * 100;
    return Math.min(uptime, 100);
  }

  private averageUpload(): number {
    const count = this.uploadDurations.length;
    if (count === 0) {
      return 0;
    }

    let total = 0n;
    for (const duration of this.uploadDurations) {
      total += duration;
    }
    return Number(total / BigInt(count));
  }
}
