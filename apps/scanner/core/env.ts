/**
 * Environment defaults for the scanner. Read lazily so that the CLI can load
 * `.env` through dotenv before anything looks at process.env.
 */

export const DEFAULT_RANGES_URL = 'https://api.cloudflare.com/client/v4/ips';
export const DEFAULT_GEO_LOOKUP_URL = 'https://ipinfo.io';

export interface EnvDefaults {
  mode?: string;
  limit: number;
  tries?: number;
  timeoutMs: number;
  probeConcurrency?: number;
  tcpPort: number;
  geoConcurrency: number;
  geoTimeoutMs: number;
  rangesUrl: string;
  geoBaseUrl: string;
}

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return parseInt(value, 10);
}

export function readEnvDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  return {
    mode: env.PROBE_MODE || undefined,
    limit: intFromEnv(env.LEADERBOARD_LIMIT) ?? 20,
    tries: intFromEnv(env.PROBE_TRIES),
    timeoutMs: intFromEnv(env.PROBE_TIMEOUT_MS) ?? 1000,
    probeConcurrency: intFromEnv(env.PROBE_CONCURRENCY),
    tcpPort: intFromEnv(env.TCP_PROBE_PORT) ?? 443,
    geoConcurrency: intFromEnv(env.GEO_CONCURRENCY) ?? 5,
    geoTimeoutMs: intFromEnv(env.GEO_TIMEOUT_MS) ?? 10_000,
    rangesUrl: env.IP_RANGES_URL || DEFAULT_RANGES_URL,
    geoBaseUrl: env.GEO_LOOKUP_URL || DEFAULT_GEO_LOOKUP_URL,
  };
}
