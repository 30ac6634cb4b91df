import { CompletionChannel } from '../core/channel.js';
import { createWorkerPool } from '../core/limiters.js';
import { debug } from '../core/logger.js';
import { describeError } from '../core/errors.js';
import { PROBE_DEFAULTS, type ProbeStrategy } from '../modules/probeStrategy.js';

export interface ProbeOutcome {
  target: string;
  /** Mean round-trip in ms; null when the address was unreachable. */
  latency: number | null;
}

export interface ReachableOutcome extends ProbeOutcome {
  latency: number;
}

export interface ProbeEngineOptions {
  strategy: ProbeStrategy;
  tries: number;
  timeoutMs: number;
  /** Defaults to the strategy's own pool size. */
  concurrency?: number;
}

/** Outcomes at or above `maxLatencyMs` never reach the leaderboard. */
export function isAdmissible(outcome: ProbeOutcome, maxLatencyMs?: number): outcome is ReachableOutcome {
  if (outcome.latency === null) return false;
  return maxLatencyMs === undefined || outcome.latency < maxLatencyMs;
}

/**
 * Applies one ProbeStrategy to every target on a fixed-size pool and yields
 * one outcome per target in completion order. Iteration ends only once every
 * dispatched probe has finished.
 */
export class ProbeEngine {
  readonly concurrency: number;

  constructor(private readonly options: ProbeEngineOptions) {
    this.concurrency = options.concurrency ?? PROBE_DEFAULTS[options.strategy.mode].concurrency;
  }

  async *run(targets: readonly string[]): AsyncGenerator<ProbeOutcome, void, undefined> {
    const pool = createWorkerPool('probeEngine', this.concurrency);
    const completions = new CompletionChannel<ProbeOutcome>();

    const dispatched = targets.map((target) =>
      pool.add(async () => {
        completions.push(await this.probeTarget(target));
      })
    );
    const settled = Promise.all(dispatched).then(
      () => completions.close(),
      (err: unknown) => completions.fail(err)
    );

    yield* completions;
    await settled;
  }

  private async probeTarget(target: string): Promise<ProbeOutcome> {
    const { strategy, tries, timeoutMs } = this.options;
    try {
      const latency = await strategy.probe(target, tries, timeoutMs);
      return { target, latency };
    } catch (err) {
      debug(`Probe raised: ${describeError(err)}`, { module: 'probeEngine', address: target });
      return { target, latency: null };
    }
  }
}
