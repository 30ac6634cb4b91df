export const PROBE_MODES = ['icmp', 'tcp'] as const;
export type ProbeMode = (typeof PROBE_MODES)[number];

/**
 * One latency measurement against one address.
 *
 * Implementations run `tries` attempts in sequence and resolve to the mean
 * round-trip time in milliseconds, or `null` as soon as any attempt fails.
 * A probe never rejects.
 */
export interface ProbeStrategy {
  readonly mode: ProbeMode;
  probe(address: string, tries: number, timeoutMs: number): Promise<number | null>;
}

// Spawning ping costs a process per target, a TCP connect only a socket.
export const PROBE_DEFAULTS: Record<ProbeMode, { tries: number; concurrency: number }> = {
  icmp: { tries: 6, concurrency: 50 },
  tcp: { tries: 4, concurrency: 10 },
};

export function isProbeMode(value: string): value is ProbeMode {
  return (PROBE_MODES as readonly string[]).includes(value);
}

export function meanLatency(samples: readonly number[]): number | null {
  if (samples.length === 0) return null;
  return samples.reduce((sum, ms) => sum + ms, 0) / samples.length;
}
