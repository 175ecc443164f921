/**
 * Server Configuration
 * ====================
 * Reads settings from environment variables (optionally via .env),
 * validates them and fills in defaults.
 *
 * LOG_DIR is read by the logger itself at import time.
 */

import { z } from 'zod';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

export const ServerConfigSchema = z.object({
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(6733),
  API_VERSION: z.string().regex(/^v\d+$/).default('v1'),
  DEVICES_FILE: z.string().min(1).default('devices.csv'),
  ENFORCE_DEVICE_WHITELIST: booleanFlag(true),
  RESULTS_FILE: z.string().min(1).default('results.txt'),
  RESULTS_LOG_ENABLED: booleanFlag(true),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
});

export interface ServerConfig {
  host: string;
  port: number;
  apiBase: string;
  devicesFile: string;
  enforceDeviceWhitelist: boolean;
  resultsFile: string;
  resultsLogEnabled: boolean;
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Empty variables count as unset
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      defined[key] = value;
    }
  }

  const parsed = ServerConfigSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const settings = parsed.data;
  return {
    host: settings.HOST,
    port: settings.PORT,
    apiBase: `/api/${settings.API_VERSION}`,
    devicesFile: settings.DEVICES_FILE,
    enforceDeviceWhitelist: settings.ENFORCE_DEVICE_WHITELIST,
    resultsFile: settings.RESULTS_FILE,
    resultsLogEnabled: settings.RESULTS_LOG_ENABLED,
    logLevel: settings.LOG_LEVEL,
  };
}
