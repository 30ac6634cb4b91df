import type PQueue from 'p-queue';
import { createWorkerPool } from '../core/limiters.js';
import { warn } from '../core/logger.js';
import { describeError } from '../core/errors.js';
import { GEO_LOOKUP_FAILED, type GeoLookup } from '../modules/geoLookup.js';
import type { LocationUpdate } from './rankingStore.js';

export const DEFAULT_GEO_CONCURRENCY = 5;

export type LocationListener = (update: LocationUpdate) => void;

/**
 * Resolves locations for admitted addresses on its own small pool and hands
 * each result back as a `{ address, location }` message.
 */
export class EnrichmentWorker {
  private readonly pool: PQueue;
  private scheduled = 0;

  constructor(
    private readonly lookup: GeoLookup,
    private readonly deliver: LocationListener,
    concurrency: number = DEFAULT_GEO_CONCURRENCY
  ) {
    this.pool = createWorkerPool('enrichment', concurrency);
  }

  /** Enqueues a lookup and returns immediately. */
  schedule(address: string): void {
    this.scheduled++;
    void this.pool.add(() => this.enrich(address));
  }

  /** Resolves once every scheduled lookup has been delivered. */
  async drain(): Promise<void> {
    await this.pool.onIdle();
  }

  get scheduledCount(): number {
    return this.scheduled;
  }

  // Never rejects: the pool's add() promise is not awaited by schedule().
  private async enrich(address: string): Promise<void> {
    let location: string;
    try {
      location = await this.lookup.resolve(address);
    } catch (err) {
      warn(`Location lookup threw: ${describeError(err)}`, { module: 'enrichment', address });
      location = GEO_LOOKUP_FAILED;
    }

    try {
      this.deliver({ address, location });
    } catch (err) {
      warn(`Location update was not applied: ${describeError(err)}`, { module: 'enrichment', address });
    }
  }
}
