import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { EnvDefaults } from './env.js';
import { PROBE_DEFAULTS, PROBE_MODES, isProbeMode } from '../modules/probeStrategy.js';

const positiveInt = z.number().int().positive();

const ScanConfigSchema = z.object({
  mode: z.enum(PROBE_MODES),
  limit: positiveInt,
  maxLatencyMs: z.number().positive().optional(),
  tries: positiveInt,
  timeoutMs: positiveInt,
  probeConcurrency: positiveInt,
  geoConcurrency: positiveInt,
  geoTimeoutMs: positiveInt,
  tcpPort: z.number().int().min(1).max(65535),
  ipListPath: z.string().min(1).optional(),
  outPath: z.string().min(1).optional(),
  rangesUrl: z.string().url(),
  geoBaseUrl: z.string().url(),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;

/** Values given on the command line; anything unset falls back to the environment. */
export interface ScanOptions {
  mode?: string;
  ipListPath?: string;
  limit?: number;
  maxLatencyMs?: number;
  outPath?: string;
  tries?: number;
  timeoutMs?: number;
  probeConcurrency?: number;
  geoConcurrency?: number;
  tcpPort?: number;
}

export function resolveScanConfig(options: ScanOptions, env: EnvDefaults): ScanConfig {
  const mode = options.mode ?? env.mode ?? 'icmp';
  const modeDefaults = isProbeMode(mode) ? PROBE_DEFAULTS[mode] : undefined;

  const parsed = ScanConfigSchema.safeParse({
    mode,
    limit: options.limit ?? env.limit,
    maxLatencyMs: options.maxLatencyMs,
    tries: options.tries ?? env.tries ?? modeDefaults?.tries,
    timeoutMs: options.timeoutMs ?? env.timeoutMs,
    probeConcurrency: options.probeConcurrency ?? env.probeConcurrency ?? modeDefaults?.concurrency,
    geoConcurrency: options.geoConcurrency ?? env.geoConcurrency,
    geoTimeoutMs: env.geoTimeoutMs,
    tcpPort: options.tcpPort ?? env.tcpPort,
    ipListPath: options.ipListPath,
    outPath: options.outPath,
    rangesUrl: env.rangesUrl,
    geoBaseUrl: env.geoBaseUrl,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
