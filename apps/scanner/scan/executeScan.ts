import { nanoid } from 'nanoid';
import { holdLogs, info, releaseLogs } from '../core/logger.js';
import type { ScanConfig } from '../core/config.js';
import type { GeoLookup } from '../modules/geoLookup.js';
import type { ProbeStrategy } from '../modules/probeStrategy.js';
import { EnrichmentWorker } from './enrichmentWorker.js';
import { ProbeEngine, isAdmissible } from './probeEngine.js';
import { ProgressTracker, type Clock } from './progressTracker.js';
import { RankingStore, type RankEntry } from './rankingStore.js';
import type { Renderer, StatusLine } from './renderer.js';

export const WAITING_FOR_LOOKUPS: StatusLine = {
  message: 'Waiting for location lookups to finish...',
  tone: 'waiting',
};
export const SCAN_COMPLETE: StatusLine = { message: 'Scanning complete.', tone: 'done' };

export type ScanSettings = Pick<
  ScanConfig,
  'limit' | 'maxLatencyMs' | 'tries' | 'timeoutMs' | 'probeConcurrency' | 'geoConcurrency'
>;

export interface ScanDependencies {
  strategy: ProbeStrategy;
  geo: GeoLookup;
  renderer: Renderer;
  clock?: Clock;
  scanId?: string;
  /**
   * Queue log lines until the final frame is painted. Set when the renderer
   * and the log stream share a terminal.
   */
  holdLogs?: boolean;
}

export interface ScanSummary {
  scanId: string;
  leaderboard: RankEntry[];
  tested: number;
  total: number;
  admitted: number;
  lookups: number;
  durationMs: number;
}

/**
 * Probes every target once and keeps the `limit` fastest on the board.
 *
 * Shutdown order: every probe completes, then every scheduled location
 * lookup drains, then the final frame is painted. Persisting the board is
 * left to the caller, after this resolves.
 */
export async function executeScan(
  targets: readonly string[],
  settings: ScanSettings,
  deps: ScanDependencies
): Promise<ScanSummary> {
  const scanId = deps.scanId ?? nanoid(11);
  const clock = deps.clock ?? Date.now;
  const startTime = clock();

  const enrichment = new EnrichmentWorker(
    deps.geo,
    (update) => store.applyLocation(update),
    settings.geoConcurrency
  );
  const store = new RankingStore(settings.limit, (address) => enrichment.schedule(address));
  const tracker = new ProgressTracker(targets.length, clock);
  const engine = new ProbeEngine({
    strategy: deps.strategy,
    tries: settings.tries,
    timeoutMs: settings.timeoutMs,
    concurrency: settings.probeConcurrency,
  });

  info(`Probing ${targets.length} addresses (${deps.strategy.mode}, ${engine.concurrency} workers)`, {
    module: 'executeScan',
    scanId,
  });

  let admitted = 0;
  if (deps.holdLogs) holdLogs();
  try {
    for await (const outcome of engine.run(targets)) {
      tracker.recordCompletion();
      if (isAdmissible(outcome, settings.maxLatencyMs) && store.offer(outcome.target, outcome.latency)) {
        admitted++;
      }

      deps.renderer.render({
        leaderboard: store.snapshot(),
        dirty: store.takeDirty(),
        progress: tracker.snapshot(),
        status: tracker.finished ? WAITING_FOR_LOOKUPS : undefined,
      });
    }

    await enrichment.drain();

    deps.renderer.render({
      leaderboard: store.snapshot(),
      dirty: store.takeDirty(),
      progress: tracker.snapshot(),
      status: SCAN_COMPLETE,
    });
  } finally {
    if (deps.holdLogs) releaseLogs();
  }

  const durationMs = clock() - startTime;
  info(`Scan finished: ${admitted} admissions, ${enrichment.scheduledCount} location lookups`, {
    module: 'executeScan',
    scanId,
    duration: durationMs,
  });

  return {
    scanId,
    leaderboard: store.snapshot(),
    tested: tracker.snapshot().tested,
    total: targets.length,
    admitted,
    lookups: enrichment.scheduledCount,
    durationMs,
  };
}
