import PQueue from 'p-queue';
import { debug } from './logger.js';

/**
 * A fixed number of workers pulling tasks from a FIFO queue. The probing and
 * enrichment pools are separate instances so a slow geo lookup never holds up
 * a probe slot.
 */
export function createWorkerPool(name: string, concurrency: number): PQueue {
  const pool = new PQueue({ concurrency });
  debug(`Created worker pool (max: ${concurrency})`, { module: name });
  return pool;
}
