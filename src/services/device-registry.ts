/**
 * Device Registry
 * Whitelist of device IDs allowed to report, loaded from a CSV file.
 *
 * File format: one device per line, ID in the first column. A leading
 * "device_id" header and blank lines are skipped.
 */

import { promises as fs } from 'fs';
import { MetricsStore } from '../store/metrics-store';
import logger from '../utils/logger';

const HEADER_COLUMN = 'device_id';

export class DeviceRegistry {
  private readonly knownIds = new Set<string>();

  constructor(private readonly store: MetricsStore) {}

  /**
   * Load IDs from the file and register each one with the store
   */
  async loadFromFile(filePath: string): Promise<number> {
    const content = await fs.readFile(filePath, 'utf8');
    const ids = parseDeviceList(content);

    for (const id of ids) {
      this.register(id);
    }

    logger.info(`Loaded ${ids.length} devices from ${filePath}`);
    return ids.length;
  }

  register(deviceId: string): void {
    this.knownIds.add(deviceId);
    this.store.registerDevice(deviceId);
  }

  isKnown(deviceId: string): boolean {
    return this.knownIds.has(deviceId);
  }

  get size(): number {
    return this.knownIds.size;
  }

  ids(): string[] {
    return Array.from(this.knownIds);
  }
}

export function parseDeviceList(content: string): string[] {
  const ids: string[] = [];
  const seen = new Set<string>();

  content.split(/\r?\n/).forEach((line, index) => {
    const id = line.split(',')[0].trim();
    if (!id) {
      return;
    }
    if (index === 0 && id.toLowerCase() === HEADER_COLUMN) {
      return;
    }
    if (!seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  });

  return ids;
}
