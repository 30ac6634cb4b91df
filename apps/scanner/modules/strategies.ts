import type { ScanConfig } from '../core/config.js';
import { IcmpProbe } from './icmpProbe.js';
import type { ProbeStrategy } from './probeStrategy.js';
import { TcpProbe } from './tcpProbe.js';

export function createProbeStrategy(config: Pick<ScanConfig, 'mode' | 'tcpPort'>): ProbeStrategy {
  switch (config.mode) {
    case 'icmp':
      return new IcmpProbe();
    case 'tcp':
      return new TcpProbe({ port: config.tcpPort });
    default: {
      const exhaustive: never = config.mode;
      throw new Error(`Unknown probe mode: ${String(exhaustive)}`);
    }
  }
}
