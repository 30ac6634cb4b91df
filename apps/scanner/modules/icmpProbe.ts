import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { debug } from '../core/logger.js';
import { describeError } from '../core/errors.js';
import type { ProbeStrategy } from './probeStrategy.js';

const exec = promisify(execFile);

// ping sends one echo request per second by default.
const PING_INTERVAL_MS = 1000;

export type PingRunner = (args: string[], timeoutMs: number) => Promise<string>;

export interface PingSummary {
  transmitted: number;
  received: number;
  averageMs: number | null;
}

const defaultRunner: PingRunner = async (args, timeoutMs) => {
  const { stdout } = await exec('ping', args, {
    timeout: timeoutMs,
    killSignal: 'SIGKILL',
    windowsHide: true,
  });
  return stdout;
};

export function buildPingArgs(
  address: string,
  tries: number,
  timeoutMs: number,
  platform: NodeJS.Platform = process.platform
): string[] {
  if (platform === 'win32') {
    return ['-n', String(tries), '-w', String(timeoutMs), address];
  }
  if (platform === 'darwin') {
    // macOS takes -W in milliseconds
    return ['-c', String(tries), '-W', String(timeoutMs), address];
  }
  return ['-c', String(tries), '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), address];
}

/**
 * Parses the summary block printed by Linux, macOS and Windows ping.
 * Returns null when no packet statistics line is present.
 */
export function parsePingSummary(output: string): PingSummary | null {
  let transmitted: number | null = null;
  let received: number | null = null;
  let averageMs: number | null = null;

  for (const line of output.split(/\r?\n/)) {
    // Linux / macOS: "6 packets transmitted, 6 received, 0% packet loss"
    const unixCounts = line.match(/(\d+)\s+packets transmitted,\s+(\d+)\s+(?:packets\s+)?received/);
    if (unixCounts) {
      transmitted = Number(unixCounts[1]);
      received = Number(unixCounts[2]);
      continue;
    }

    // Windows: "Packets: Sent = 4, Received = 4, Lost = 0 (0% loss),"
    const winCounts = line.match(/Sent\s*=\s*(\d+),\s*Received\s*=\s*(\d+)/);
    if (winCounts) {
      transmitted = Number(winCounts[1]);
      received = Number(winCounts[2]);
      continue;
    }

    // "rtt min/avg/max/mdev = ..." or "round-trip min/avg/max/stddev = ..."
    if (line.includes('round-trip') || line.includes('rtt')) {
      const values = line.split('=')[1]?.trim().split('/');
      const avg = values && values.length > 1 ? Number.parseFloat(values[1]) : Number.NaN;
      if (Number.isFinite(avg)) averageMs = avg;
      continue;
    }

    const winAverage = line.match(/Average\s*=\s*([\d.]+)\s*ms/);
    if (winAverage) {
      averageMs = Number.parseFloat(winAverage[1]);
    }
  }

  if (transmitted === null || received === null) return null;
  return { transmitted, received, averageMs };
}

export interface IcmpProbeOptions {
  run?: PingRunner;
  platform?: NodeJS.Platform;
}

/** Echo-reply latency through the system ping binary. */
export class IcmpProbe implements ProbeStrategy {
  readonly mode = 'icmp' as const;
  private readonly run: PingRunner;
  private readonly platform: NodeJS.Platform;

  constructor(options: IcmpProbeOptions = {}) {
    this.run = options.run ?? defaultRunner;
    this.platform = options.platform ?? process.platform;
  }

  async probe(address: string, tries: number, timeoutMs: number): Promise<number | null> {
    const args = buildPingArgs(address, tries, timeoutMs, this.platform);
    let output: string;
    try {
      output = await this.run(args, tries * (PING_INTERVAL_MS + timeoutMs));
    } catch (err) {
      debug(`ping failed: ${describeError(err)}`, { module: 'icmpProbe', address });
      return null;
    }

    const summary = parsePingSummary(output);
    // A single lost reply fails the whole probe.
    if (!summary || summary.received !== tries || summary.transmitted !== tries) {
      return null;
    }
    return summary.averageMs;
  }
}
