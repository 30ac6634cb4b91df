import { writeFile } from 'node:fs/promises';
import { OutputSinkError } from '../core/errors.js';
import type { RankEntry } from '../scan/rankingStore.js';
import { TABLE_SEPARATOR, formatLatency, headerLine, locationLabel, padCells } from '../scan/table.js';

export interface OutputSink {
  readonly destination: string;
  write(entries: readonly RankEntry[]): Promise<void>;
}

export function formatLeaderboardFile(entries: readonly RankEntry[]): string {
  const lines = [headerLine(), TABLE_SEPARATOR];
  entries.forEach((entry, index) => {
    lines.push(padCells(String(index + 1), entry.address, locationLabel(entry, 'N/A')) + formatLatency(entry.latency));
  });
  return lines.join('\n') + '\n';
}

/** Writes the final leaderboard as a fixed-width text table. */
export class FileOutputSink implements OutputSink {
  constructor(readonly destination: string) {}

  async write(entries: readonly RankEntry[]): Promise<void> {
    try {
      await writeFile(this.destination, formatLeaderboardFile(entries), 'utf8');
    } catch (err) {
      throw new OutputSinkError(this.destination, { cause: err });
    }
  }
}
