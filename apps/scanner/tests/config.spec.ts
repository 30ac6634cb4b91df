import { describe, it, expect } from 'vitest';
import { resolveScanConfig } from '../core/config.js';
import { DEFAULT_GEO_LOOKUP_URL, DEFAULT_RANGES_URL, readEnvDefaults } from '../core/env.js';
import { ConfigError } from '../core/errors.js';
import { parseCliArgs } from '../cli.js';

function issuePaths(run: () => unknown): string[] {
  try {
    run();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues.map((issue) => issue.split(':')[0]);
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveScanConfig', () => {
  it('falls back to the icmp defaults', () => {
    expect(resolveScanConfig({}, readEnvDefaults({}))).toEqual({
      mode: 'icmp',
      limit: 20,
      maxLatencyMs: undefined,
      tries: 6,
      timeoutMs: 1000,
      probeConcurrency: 50,
      geoConcurrency: 5,
      geoTimeoutMs: 10_000,
      tcpPort: 443,
      ipListPath: undefined,
      outPath: undefined,
      rangesUrl: DEFAULT_RANGES_URL,
      geoBaseUrl: DEFAULT_GEO_LOOKUP_URL,
    });
  });

  it('uses smaller pools and fewer tries for tcp', () => {
    const config = resolveScanConfig({ mode: 'tcp' }, readEnvDefaults({}));
    expect(config.tries).toBe(4);
    expect(config.probeConcurrency).toBe(10);
  });

  it('reads defaults from the environment', () => {
    const env = readEnvDefaults({
      LEADERBOARD_LIMIT: '5',
      PROBE_MODE: 'tcp',
      PROBE_TRIES: '2',
      GEO_LOOKUP_URL: 'https://geo.example',
    });
    const config = resolveScanConfig({}, env);
    expect(config).toMatchObject({ mode: 'tcp', limit: 5, tries: 2, geoBaseUrl: 'https://geo.example' });
  });

  it('lets flags override the environment', () => {
    const env = readEnvDefaults({ LEADERBOARD_LIMIT: '5', PROBE_MODE: 'tcp' });
    const config = resolveScanConfig({ limit: 3, mode: 'icmp', maxLatencyMs: 150 }, env);
    expect(config).toMatchObject({ mode: 'icmp', limit: 3, maxLatencyMs: 150, tries: 6 });
  });

  it('rejects a non-positive limit', () => {
    expect(issuePaths(() => resolveScanConfig({ limit: 0 }, readEnvDefaults({})))).toEqual(['limit']);
  });

  it('rejects a limit that is not a number', () => {
    expect(issuePaths(() => resolveScanConfig({}, readEnvDefaults({ LEADERBOARD_LIMIT: 'abc' })))).toEqual([
      'limit',
    ]);
  });

  it('rejects an unknown probe mode', () => {
    expect(issuePaths(() => resolveScanConfig({ mode: 'udp' }, readEnvDefaults({})))).toContain('mode');
  });

  it('rejects an out-of-range port', () => {
    expect(issuePaths(() => resolveScanConfig({ tcpPort: 70000 }, readEnvDefaults({})))).toEqual(['tcpPort']);
  });
});

describe('parseCliArgs', () => {
  it('maps flags onto scan options', () => {
    expect(
      parseCliArgs(['--mode', 'tcp', '--limit', '10', '--max-latency', '150', '--out', 'best.txt', '--port', '8443'])
    ).toEqual({
      kind: 'scan',
      options: { mode: 'tcp', limit: 10, maxLatencyMs: 150, outPath: 'best.txt', tcpPort: 8443 },
    });
  });

  it('recognises --help anywhere', () => {
    expect(parseCliArgs(['--limit', '3', '--help'])).toEqual({ kind: 'help' });
  });

  it('rejects missing values, non-integers and unknown flags', () => {
    expect(issuePaths(() => parseCliArgs(['--limit']))).toEqual(['--limit']);
    expect(issuePaths(() => parseCliArgs(['--limit', '--out', 'x']))).toEqual(['--limit']);
    expect(issuePaths(() => parseCliArgs(['--tries', 'three']))).toEqual(['--tries']);
    expect(issuePaths(() => parseCliArgs(['--verbose']))).toEqual(["unknown argument '--verbose'"]);
  });
});
