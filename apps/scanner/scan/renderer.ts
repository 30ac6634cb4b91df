import type { ProgressSnapshot } from './progressTracker.js';
import type { RankEntry } from './rankingStore.js';
import { COLUMN_WIDTHS, TABLE_SEPARATOR, formatLatency, headerLine, locationLabel, padCells } from './table.js';

export const Ansi = {
  HEADER: '\x1b[95m',
  GREEN: '\x1b[92m',
  YELLOW: '\x1b[93m',
  RED: '\x1b[91m',
  CYAN: '\x1b[96m',
  BOLD: '\x1b[1m',
  ENDC: '\x1b[0m',
  CURSOR_UP: '\x1b[A',
  CLEAR_LINE: '\x1b[K',
} as const;

const PROGRESS_BAR_LENGTH = 40;

export interface TerminalWriter {
  write(chunk: string): unknown;
}

export type StatusTone = 'waiting' | 'done';

export interface StatusLine {
  message: string;
  tone: StatusTone;
}

export interface RenderFrame {
  leaderboard: readonly RankEntry[];
  /** The table region is only repainted when the board changed. */
  dirty: boolean;
  progress: ProgressSnapshot;
  /** Replaces the progress lines, e.g. once every probe has finished. */
  status?: StatusLine;
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.ceil(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  const pad = (n: number) => String(n).padStart(2, '0');

  if (hours > 0) return `${hours}h ${pad(minutes)}m ${pad(secs)}s`;
  if (minutes > 0) return `${minutes}m ${pad(secs)}s`;
  return `${secs}s`;
}

export function latencyColor(latencyMs: number): string {
  if (latencyMs < 100) return Ansi.GREEN;
  if (latencyMs < 200) return Ansi.YELLOW;
  return Ansi.RED;
}

/**
 * Repaints the leaderboard and progress region in place. Holds the only
 * state needed for that: how many lines each region occupied last time.
 * Must be driven from a single caller.
 */
export class Renderer {
  private previousTableLines = 0;
  private previousStatusLines = 0;
  private readonly color: boolean;

  constructor(
    private readonly out: TerminalWriter,
    options: { color?: boolean } = {}
  ) {
    this.color = options.color ?? false;
  }

  render(frame: RenderFrame): void {
    const tableLines = frame.dirty ? this.tableLines(frame.leaderboard) : [];
    const statusLines = ['', ...(frame.status ? [this.statusText(frame.status)] : this.progressLines(frame.progress))];

    const linesToClear = frame.dirty
      ? this.previousTableLines + this.previousStatusLines
      : this.previousStatusLines;

    if (frame.dirty) {
      this.previousTableLines = tableLines.length;
    }
    this.previousStatusLines = statusLines.length;

    let buffer = (Ansi.CURSOR_UP + Ansi.CLEAR_LINE).repeat(linesToClear);
    if (tableLines.length > 0) {
      buffer += tableLines.join('\n') + '\n';
    }
    buffer += statusLines.join('\n') + '\n';
    this.out.write(buffer);
  }

  private paint(code: string, text: string): string {
    return this.color ? `${code}${text}${Ansi.ENDC}` : text;
  }

  private tableLines(entries: readonly RankEntry[]): string[] {
    const lines = [this.paint(Ansi.BOLD + Ansi.HEADER, headerLine()), TABLE_SEPARATOR];
    entries.forEach((entry, index) => {
      const cells = padCells(String(index + 1), entry.address, locationLabel(entry, '...'));
      const latency = formatLatency(entry.latency).padEnd(COLUMN_WIDTHS.latency);
      lines.push(cells + this.paint(latencyColor(entry.latency), latency));
    });
    return lines;
  }

  private progressLines(progress: ProgressSnapshot): string[] {
    const filled =
      progress.total > 0 ? Math.floor((progress.tested / progress.total) * PROGRESS_BAR_LENGTH) : 0;
    const bar = `[${'█'.repeat(filled)}${'-'.repeat(PROGRESS_BAR_LENGTH - filled)}]`;

    return [
      this.paint(Ansi.YELLOW, 'Scanning Progress: ') +
        bar +
        this.paint(Ansi.YELLOW, ` ${progress.tested}/${progress.total}`),
      this.paint(
        Ansi.YELLOW,
        `Time elapsed: ${formatDuration(progress.elapsedSeconds)}  ` +
          `Estimated time remaining: ${formatDuration(progress.remainingSeconds)}`
      ),
    ];
  }

  private statusText(status: StatusLine): string {
    return this.paint(status.tone === 'done' ? Ansi.GREEN : Ansi.YELLOW, status.message);
  }
}
