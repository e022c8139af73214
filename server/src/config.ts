/**
 * Server configuration, read once from the environment (.env is loaded by dotenv in index.ts).
 */

export interface ServerConfig {
  port: number;
  host: string;
  currency: {
    url?: string;
    cacheTtlMs: number;
    timeoutMs: number;
  };
}

/** Integer from the environment; unset, unparsable or below `min` gives the default */
function intFromEnv(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < min) {
    console.warn(`[Config] Ignoring ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: intFromEnv(env, 'PORT', 3100, 1),
    host: env.HOST || '0.0.0.0',
    currency: {
      url: env.CBR_URL || undefined,
      cacheTtlMs: intFromEnv(env, 'RATES_CACHE_TTL_SECONDS', 300, 0) * 1000,
      timeoutMs: intFromEnv(env, 'RATES_FETCH_TIMEOUT_MS', 10000, 1),
    },
  };
}
