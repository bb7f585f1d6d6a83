import { getEnv, getEnvFloat, getEnvInt, isTrue } from './env.js';

export type AppConfig = {
  port: number;
  corsOrigin?: string; // comma-separated origins or /regex/ entries; unset allows all
  maxPayloadBytes: number;
  jobRetentionMs: number;
  jobTimeoutMs: number;
  maxConcurrent: number;
  subscriberBufferCapacity: number;
  maxConsecutiveDrops: number;
  heartbeatIntervalMs: number;
  subscriberTimeoutMs: number;
  reaperIntervalMs: number;
  syncWaitMs: number;
  settingsApiEnabled: boolean; // POST /api/settings; off unless SETTINGS_API_ENABLED is set
};

const MB = 1024 * 1024;

export const DEFAULT_CONFIG: AppConfig = {
  port: 8000,
  corsOrigin: undefined,
  maxPayloadBytes: 50 * MB,
  jobRetentionMs: 60 * 60 * 1000,
  jobTimeoutMs: 5 * 60 * 1000,
  maxConcurrent: 10,
  subscriberBufferCapacity: 100,
  maxConsecutiveDrops: 500,
  heartbeatIntervalMs: 30_000,
  subscriberTimeoutMs: 60 * 60 * 1000,
  reaperIntervalMs: 60_000,
  syncWaitMs: 30_000,
  settingsApiEnabled: false,
};

const clamp = (n: number, min: number, max: number) => Math.max(min, Math.min(max, n));

export function loadConfig(): AppConfig {
  const d = DEFAULT_CONFIG;
  const corsOrigin = getEnv('CORS_ORIGIN').trim();
  const maxPayloadMb = getEnvFloat('MAX_PAYLOAD_MB', d.maxPayloadBytes / MB);
  return {
    port: getEnvInt('PORT', d.port),
    corsOrigin: corsOrigin && corsOrigin !== '*' ? corsOrigin : undefined,
    maxPayloadBytes: Math.floor(maxPayloadMb * MB),
    jobRetentionMs: getEnvInt('JOB_RETENTION_SEC', d.jobRetentionMs / 1000) * 1000,
    jobTimeoutMs: getEnvInt('JOB_TIMEOUT_SEC', d.jobTimeoutMs / 1000) * 1000,
    maxConcurrent: clamp(getEnvInt('MAX_CONCURRENT_CONVERSIONS', d.maxConcurrent), 1, 64),
    subscriberBufferCapacity: getEnvInt('SSE_BUFFER_CAPACITY', d.subscriberBufferCapacity),
    maxConsecutiveDrops: getEnvInt('SSE_MAX_CONSECUTIVE_DROPS', d.maxConsecutiveDrops),
    heartbeatIntervalMs: getEnvInt('SSE_HEARTBEAT_INTERVAL_SEC', d.heartbeatIntervalMs / 1000) * 1000,
    subscriberTimeoutMs: getEnvInt('SSE_CONNECTION_TIMEOUT_SEC', d.subscriberTimeoutMs / 1000) * 1000,
    reaperIntervalMs: getEnvInt('REAPER_INTERVAL_SEC', d.reaperIntervalMs / 1000) * 1000,
    syncWaitMs: getEnvInt('SYNC_WAIT_SEC', d.syncWaitMs / 1000) * 1000,
    settingsApiEnabled: isTrue(getEnv('SETTINGS_API_ENABLED')),
  };
}

/**
 * Returns a list of human-readable problems; empty when the config is usable.
 */
export function validateConfig(cfg: AppConfig): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(cfg.port) || cfg.port < 1 || cfg.port > 65535) {
    errors.push(`Invalid port: ${cfg.port}`);
  }
  if (!(cfg.maxPayloadBytes > 0)) errors.push(`Invalid max payload size: ${cfg.maxPayloadBytes}`);
  if (!(cfg.jobRetentionMs > 0)) errors.push(`Invalid job retention: ${cfg.jobRetentionMs}`);
  if (!(cfg.jobTimeoutMs > 0)) errors.push(`Invalid job timeout: ${cfg.jobTimeoutMs}`);
  if (!(cfg.subscriberBufferCapacity > 0)) {
    errors.push(`Invalid subscriber buffer capacity: ${cfg.subscriberBufferCapacity}`);
  }
  if (!(cfg.maxConsecutiveDrops >= 0)) errors.push(`Invalid drop threshold: ${cfg.maxConsecutiveDrops}`);
  if (!(cfg.heartbeatIntervalMs > 0)) errors.push(`Invalid heartbeat interval: ${cfg.heartbeatIntervalMs}`);
  if (!(cfg.subscriberTimeoutMs > 0)) errors.push(`Invalid subscriber timeout: ${cfg.subscriberTimeoutMs}`);
  if (cfg.subscriberTimeoutMs > 0 && cfg.subscriberTimeoutMs <= cfg.heartbeatIntervalMs) {
    errors.push('Subscriber timeout must be longer than the heartbeat interval');
  }
  if (!(cfg.reaperIntervalMs > 0)) errors.push(`Invalid reaper interval: ${cfg.reaperIntervalMs}`);
  return errors;
}
