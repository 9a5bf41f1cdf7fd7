/**
 * Server configuration from environment variables.
 *
 * The entry point loads `.env` with dotenv before calling loadConfig();
 * unset or unparsable values fall back to the defaults below.
 */

import { join } from 'path';

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  dbPath: string;
  /** Concurrent performance registrations per attendee per jam */
  maxPerformances: number;
  /** Extra attempts for a conflicting or busy store transaction */
  storeMaxRetries: number;
  dbBusyTimeoutMs: number;
  mutationTimeoutMs: number;
  broadcastSendTimeoutMs: number;
  /** null = manager routes are open */
  managerToken: string | null;
  corsOrigin: string;
  socketPingIntervalMs: number;
  socketPingTimeoutMs: number;
}

function intFromEnv(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const dataDir = env.DATA_DIR || './data';

  return {
    port: intFromEnv(env.PORT, 4000),
    host: env.HOST || '0.0.0.0',
    dataDir,
    dbPath: env.DB_PATH || join(dataDir, 'jams.db'),
    maxPerformances: intFromEnv(env.MAX_PERFORMANCES_PER_ATTENDEE, 3, 1),
    storeMaxRetries: intFromEnv(env.STORE_MAX_RETRIES, 3),
    dbBusyTimeoutMs: intFromEnv(env.DB_BUSY_TIMEOUT_MS, 5000),
    mutationTimeoutMs: intFromEnv(env.MUTATION_TIMEOUT_MS, 10000),
    broadcastSendTimeoutMs: intFromEnv(env.BROADCAST_SEND_TIMEOUT_MS, 5000),
    managerToken: env.MANAGER_TOKEN || null,
    corsOrigin: env.CORS_ORIGIN || '*',
    socketPingIntervalMs: intFromEnv(env.SOCKET_PING_INTERVAL_MS, 15000, 1),
    socketPingTimeoutMs: intFromEnv(env.SOCKET_PING_TIMEOUT_MS, 5000, 1),
  };
}
