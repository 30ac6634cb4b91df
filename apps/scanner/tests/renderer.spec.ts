import { describe, it, expect } from 'vitest';
import { Ansi, Renderer, formatDuration, latencyColor } from '../scan/renderer.js';
import type { ProgressSnapshot } from '../scan/progressTracker.js';
import type { RankEntry } from '../scan/rankingStore.js';

class MemoryTerminal {
  readonly chunks: string[] = [];
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
  get last(): string {
    return this.chunks[this.chunks.length - 1];
  }
}

const ERASE = Ansi.CURSOR_UP + Ansi.CLEAR_LINE;

const HEADER = 'Rank    IP Address        Location                      Latency (ms)';
const SEPARATOR = '-'.repeat(70);

const progress = (tested: number, total: number, elapsedSeconds = 2.5, remainingSeconds = 6): ProgressSnapshot => ({
  tested,
  total,
  elapsedSeconds,
  remainingSeconds,
  rate: 1,
});

const pending = (address: string, latency: number): RankEntry => ({
  address,
  latency,
  location: { status: 'pending' },
});

describe('Renderer', () => {
  it('paints the table and progress region on the first dirty frame', () => {
    const term = new MemoryTerminal();
    const renderer = new Renderer(term);

    renderer.render({ leaderboard: [pending('1.1.1.1', 12.5)], dirty: true, progress: progress(1, 4) });

    expect(term.last).toBe(
      [
        HEADER,
        SEPARATOR,
        '1       1.1.1.1           ...                           12.50     ',
        '',
        `Scanning Progress: [${'█'.repeat(10)}${'-'.repeat(30)}] 1/4`,
        'Time elapsed: 3s  Estimated time remaining: 6s',
      ].join('\n') + '\n'
    );
  });

  it('repaints only the status region when the board is unchanged', () => {
    const term = new MemoryTerminal();
    const renderer = new Renderer(term);
    renderer.render({ leaderboard: [pending('1.1.1.1', 12.5)], dirty: true, progress: progress(1, 4) });

    renderer.render({ leaderboard: [pending('1.1.1.1', 12.5)], dirty: false, progress: progress(2, 4, 4, 4) });

    expect(term.last).toBe(
      ERASE.repeat(3) +
        [
          '',
          `Scanning Progress: [${'█'.repeat(20)}${'-'.repeat(20)}] 2/4`,
          'Time elapsed: 4s  Estimated time remaining: 4s',
        ].join('\n') +
        '\n'
    );
  });

  it('erases both regions when the board changed', () => {
    const term = new MemoryTerminal();
    const renderer = new Renderer(term);
    renderer.render({ leaderboard: [pending('1.1.1.1', 12.5)], dirty: true, progress: progress(1, 4) });

    renderer.render({
      leaderboard: [pending('1.0.0.1', 9), pending('1.1.1.1', 12.5)],
      dirty: true,
      progress: progress(2, 4),
    });

    expect(term.last.startsWith(ERASE.repeat(6) + HEADER + '\n')).toBe(true);

    renderer.render({
      leaderboard: [pending('1.0.0.1', 9), pending('1.1.1.1', 12.5)],
      dirty: true,
      progress: progress(3, 4),
    });
    expect(term.last.startsWith(ERASE.repeat(7) + HEADER + '\n')).toBe(true);
  });

  it('replaces the progress lines with a status message', () => {
    const term = new MemoryTerminal();
    const renderer = new Renderer(term);
    renderer.render({ leaderboard: [], dirty: false, progress: progress(1, 4) });

    renderer.render({
      leaderboard: [],
      dirty: false,
      progress: progress(4, 4),
      status: { message: 'Scanning complete.', tone: 'done' },
    });

    expect(term.last).toBe(ERASE.repeat(3) + '\nScanning complete.\n');

    renderer.render({ leaderboard: [], dirty: false, progress: progress(4, 4) });
    expect(term.last.startsWith(ERASE.repeat(2) + '\nScanning Progress')).toBe(true);
  });

  it('shows resolved locations in the table', () => {
    const term = new MemoryTerminal();
    const renderer = new Renderer(term);
    renderer.render({
      leaderboard: [{ address: '1.1.1.1', latency: 250, location: { status: 'resolved', value: 'Tokyo, JP' } }],
      dirty: true,
      progress: progress(1, 1),
    });

    expect(term.last.split('\n')[2]).toBe('1       1.1.1.1           Tokyo, JP                     250.00    ');
  });

  it('colours latencies and status lines when enabled', () => {
    const term = new MemoryTerminal();
    const renderer = new Renderer(term, { color: true });
    renderer.render({
      leaderboard: [pending('1.1.1.1', 12.5)],
      dirty: true,
      progress: progress(4, 4),
      status: { message: 'Scanning complete.', tone: 'done' },
    });

    const lines = term.last.split('\n');
    expect(lines[0]).toBe(`${Ansi.BOLD}${Ansi.HEADER}${HEADER}${Ansi.ENDC}`);
    expect(lines[2]).toBe(`1       1.1.1.1           ...                           ${Ansi.GREEN}12.50     ${Ansi.ENDC}`);
    expect(lines[4]).toBe(`${Ansi.GREEN}Scanning complete.${Ansi.ENDC}`);
  });

  it('draws an empty bar when there is nothing to scan', () => {
    const term = new MemoryTerminal();
    new Renderer(term).render({ leaderboard: [], dirty: false, progress: progress(0, 0, 0, 0) });
    expect(term.last).toBe(`\nScanning Progress: [${'-'.repeat(40)}] 0/0\nTime elapsed: 0s  Estimated time remaining: 0s\n`);
  });
});

describe('formatDuration', () => {
  it('rounds seconds up and switches units', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(4.1)).toBe('5s');
    expect(formatDuration(59.2)).toBe('1m 00s');
    expect(formatDuration(125)).toBe('2m 05s');
    expect(formatDuration(3725)).toBe('1h 02m 05s');
  });
});

describe('latencyColor', () => {
  it('grades latencies at 100 and 200 ms', () => {
    expect(latencyColor(99.99)).toBe(Ansi.GREEN);
    expect(latencyColor(100)).toBe(Ansi.YELLOW);
    expect(latencyColor(199.99)).toBe(Ansi.YELLOW);
    expect(latencyColor(200)).toBe(Ansi.RED);
  });
});
