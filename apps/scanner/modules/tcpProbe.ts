import { Socket } from 'node:net';
import { performance } from 'node:perf_hooks';
import { debug } from '../core/logger.js';
import { meanLatency, type ProbeStrategy } from './probeStrategy.js';

export const DEFAULT_TCP_PORT = 443;

/** Resolves to the handshake time in ms, or null on refusal, error or timeout. */
export type Connector = (address: string, port: number, timeoutMs: number) => Promise<number | null>;

export const connectOnce: Connector = (address, port, timeoutMs) =>
  new Promise<number | null>((resolve) => {
    const socket = new Socket();
    const startedAt = performance.now();
    let settled = false;

    const finish = (latency: number | null) => {
      if (settled) return;
      settled = true;
      socket.removeAllListeners();
      // Keep a late error from an already-finished socket from going unhandled.
      socket.on('error', () => undefined);
      socket.destroy();
      resolve(latency);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(performance.now() - startedAt));
    socket.once('timeout', () => finish(null));
    socket.once('error', (err) => {
      debug(`connect failed: ${err.message}`, { module: 'tcpProbe', address });
      finish(null);
    });
    socket.connect(port, address);
  });

export interface TcpProbeOptions {
  port?: number;
  connect?: Connector;
}

/** Times the TCP handshake to a fixed service port. */
export class TcpProbe implements ProbeStrategy {
  readonly mode = 'tcp' as const;
  readonly port: number;
  private readonly connect: Connector;

  constructor(options: TcpProbeOptions = {}) {
    this.port = options.port ?? DEFAULT_TCP_PORT;
    this.connect = options.connect ?? connectOnce;
  }

  async probe(address: string, tries: number, timeoutMs: number): Promise<number | null> {
    const samples: number[] = [];
    for (let attempt = 0; attempt < tries; attempt++) {
      const latency = await this.connect(address, this.port, timeoutMs);
      if (latency === null) return null;
      samples.push(latency);
    }
    return meanLatency(samples);
  }
}
