/**
 * Stats Results Log
 * Records every stats read to the application log and appends it to a
 * plain-text results file. Failures are logged and never reach the caller.
 */

import { promises as fs } from 'fs';
import logger from '../utils/logger';

export interface StatsResultsLogOptions {
  filePath: string;
  enabled?: boolean;
}

export function formatResultLine(deviceId: string, uptime: number, avgUploadTime: string): string {
  return `[${deviceId}] uptime ${uptime.toFixed(6)}% | avgUploadTime ${avgUploadTime}`;
}

export class StatsResultsLog {
  private readonly filePath: string;
  private readonly enabled: boolean;
  // Appends are chained so lines land in the order stats were read
  private writes: Promise<void> = Promise.resolve();

  constructor(options: StatsResultsLogOptions) {
    this.filePath = options.filePath;
    this.enabled = options.enabled !== false;
  }

  record(deviceId: string, uptime: number, avgUploadTime: string): Promise<void> {
    const line = formatResultLine(deviceId, uptime, avgUploadTime);
    logger.info(line);

    if (!this.enabled) {
      return this.writes;
    }

    this.writes = this.writes.then(() => this.append(line));
    return this.writes;
  }

  /**
   * Resolves once every queued line has been written
   */
  flush(): Promise<void> {
    return this.writes;
  }

  private async append(line: string): Promise<void> {
    try {
      await fs.appendFile(this.filePath, `${line}\n`, 'utf8');
    } catch (error) {
      logger.error(`Error writing to ${this.filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
