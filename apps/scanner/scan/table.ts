import type { RankEntry } from './rankingStore.js';

// Column widths shared by the live table and the saved file.
export const COLUMN_WIDTHS = { rank: 8, address: 18, location: 30, latency: 10 } as const;
export const TABLE_SEPARATOR = '-'.repeat(70);

export const HEADER_CELLS = ['Rank', 'IP Address', 'Location', 'Latency (ms)'] as const;

export function padCells(rank: string, address: string, location: string): string {
  return (
    rank.padEnd(COLUMN_WIDTHS.rank) +
    address.padEnd(COLUMN_WIDTHS.address) +
    location.padEnd(COLUMN_WIDTHS.location)
  );
}

export function headerLine(): string {
  const [rank, address, location, latency] = HEADER_CELLS;
  return padCells(rank, address, location) + latency.padEnd(COLUMN_WIDTHS.latency);
}

export function formatLatency(latencyMs: number): string {
  return latencyMs.toFixed(2);
}

export function locationLabel(entry: RankEntry, pendingLabel: string): string {
  return entry.location.status === 'resolved' ? entry.location.value : pendingLabel;
}
