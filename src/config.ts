/**
 * Option schemas and defaults.
 *
 * Components accept a partial options object; missing fields take the
 * defaults declared here and the merged result is validated.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './exceptions';
import { DeviceModel } from './models/enums';

const byte = z.number().int().min(0).max(0xff);
const duration = z.number().int().nonnegative();
const positiveDuration = z.number().int().positive();
const positiveInt = z.number().int().positive();

export const ProtocolProfileSchema = z.object({
  som: byte,
  eom: byte,
  serviceUuid: z.string().min(1),
});

export const ConnectionConfigSchema = z
  .object({
    /** Bluetooth address of the earbuds */
    address: z.string().min(1),
    model: z.nativeEnum(DeviceModel),
    connectTimeoutMs: positiveDuration.default(30_000),
    sendTimeoutMs: positiveDuration.default(5_000),
    /** Attempts per connect() call, including the first */
    maxConnectAttempts: z.number().int().min(1).default(3),
    initialBackoffMs: duration.default(500),
    maxBackoffMs: duration.default(5_000),
    /** Reassembly buffer cap */
    maxBufferBytes: positiveInt.default(10_000),
    /** Bytes kept when the cap is exceeded */
    truncatedBufferBytes: positiveInt.default(5_000),
    /** Reconnect on transport errors while connected */
    autoReconnect: z.boolean().default(false),
    alternativeProfile: ProtocolProfileSchema.optional(),
  })
  .refine((config) => config.truncatedBufferBytes <= config.maxBufferBytes, {
    message: 'truncatedBufferBytes must not exceed maxBufferBytes',
    path: ['truncatedBufferBytes'],
  });

export const DiagnosticsConfigSchema = z.object({
  historySize: positiveInt.default(100),
  heartbeatIntervalMs: positiveDuration.default(10_000),
  maxMissedHeartbeats: positiveInt.default(3),
  deadAfterMs: positiveDuration.default(60_000),
});

export const TransferConfigSchema = z.object({
  sessionTimeoutMs: positiveDuration.default(20_000),
  controlTimeoutMs: positiveDuration.default(20_000),
  transferTimeoutMs: positiveDuration.default(10 * 60_000),
  healthCheckTimeoutMs: positiveDuration.default(10_000),
  minBatteryPercent: z.number().int().min(0).max(100).default(30),
  maxBinarySize: positiveInt.default(2 * 1024 * 1024),
  /** Wait after FOTA_ABORT before disconnecting */
  abortSettleMs: duration.default(500),
  reconnectDelayMs: duration.default(1_000),
  reconnectRetryDelayMs: duration.default(2_000),
  reconnectRetryTimeoutMs: positiveDuration.default(10_000),
});

export const RecoveryConfigSchema = z.object({
  completionTimeoutMs: positiveDuration.default(5 * 60_000),
  pollIntervalMs: positiveDuration.default(1_000),
});

export type ProtocolProfileConfig = z.infer<typeof ProtocolProfileSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type ConnectionOptions = z.input<typeof ConnectionConfigSchema>;
export type DiagnosticsConfig = z.infer<typeof DiagnosticsConfigSchema>;
export type DiagnosticsOptions = z.input<typeof DiagnosticsConfigSchema>;
export type TransferConfig = z.infer<typeof TransferConfigSchema>;
export type TransferOptions = z.input<typeof TransferConfigSchema>;
export type RecoveryConfig = z.infer<typeof RecoveryConfigSchema>;
export type RecoveryOptions = z.input<typeof RecoveryConfigSchema>;

/**
 * Recovery directory: `BUDLINK_RECOVERY_DIR`, or `~/.budlink/recovery`.
 */
export function defaultRecoveryDirectory(): string {
  return process.env.BUDLINK_RECOVERY_DIR ?? join(homedir(), '.budlink', 'recovery');
}

/**
 * Validate options against a schema.
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function parseConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${what}: ${issues}`);
  }
  return result.data;
}
