/**
 * Device metrics request/response bodies
 */

import { z } from 'zod';
import { parseEpochNanos } from '../utils/timestamp';

/** RFC 3339 timestamp, parsed to epoch nanoseconds */
const sentAt = z
  .string()
  .datetime({ offset: true })
  .transform((value, ctx) => {
    const instant = parseEpochNanos(value);
    if (instant === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
      return z.NEVER;
    }
    return instant;
  });

export const HeartbeatRequestSchema = z.object({
  sent_at: sentAt,
});

export const UploadStatsRequestSchema = z.object({
  sent_at: sentAt,
  /**
   * Upload duration in nanoseconds. JSON numbers past 2^53 - 1 (about 104
   * days) cannot be read exactly, so they are rejected.
   */
  upload_time: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
});

export type HeartbeatRequest = z.infer<typeof HeartbeatRequestSchema>;
export type UploadStatsRequest = z.infer<typeof UploadStatsRequestSchema>;

export interface DeviceStatsResponse {
  /** Go-style duration, e.g. "5m10s" */
  avg_upload_time: string;
  uptime: number;
}

export interface ErrorResponse {
  msg: string;
}
