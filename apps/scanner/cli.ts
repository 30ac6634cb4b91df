#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { resolveScanConfig, type ScanConfig, type ScanOptions } from './core/config.js';
import { readEnvDefaults } from './core/env.js';
import { ConfigError, ScanError, describeError } from './core/errors.js';
import { error as logError, info, parseLogLevel, setLogLevel } from './core/logger.js';
import { FileRangeSource, RemoteRangeSource, type AddressSource } from './modules/addressSource.js';
import { IpInfoGeoLookup } from './modules/geoLookup.js';
import { FileOutputSink } from './modules/outputSink.js';
import { createProbeStrategy } from './modules/strategies.js';
import { executeScan } from './scan/executeScan.js';
import { Ansi, Renderer } from './scan/renderer.js';

export const USAGE = `
Usage: edge-latency-scanner [options]

Probe the provider's published IPv4 ranges and list the lowest-latency addresses.

Options:
  --mode <icmp|tcp>     probe with ping (default) or a TCP handshake
  --ip-list <file>      load IP ranges from a local file (comma or newline-delimited)
  --limit <n>           number of lowest-latency addresses to keep (default: 20)
  --max-latency <ms>    only keep addresses with a latency below this value
  --out <file>          save the final table to a file
  --tries <n>           attempts per address (default: 6 for icmp, 4 for tcp)
  --timeout <ms>        per-attempt timeout (default: 1000)
  --workers <n>         concurrent probes (default: 50 for icmp, 10 for tcp)
  --geo-workers <n>     concurrent location lookups (default: 5)
  --port <n>            TCP port for --mode tcp (default: 443)
  --help                show this message
`;

export type CliCommand = { kind: 'help' } | { kind: 'scan'; options: ScanOptions };

const VALUE_FLAGS = new Set([
  '--mode',
  '--ip-list',
  '--limit',
  '--max-latency',
  '--out',
  '--tries',
  '--timeout',
  '--workers',
  '--geo-workers',
  '--port',
]);

function toInt(flag: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError([`${flag}: expected an integer, got '${raw}'`]);
  }
  return parseInt(raw, 10);
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new ConfigError([`unknown argument '${arg}'`]);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError([`${arg}: missing value`]);
    }
    values.set(arg, value);
    i++;
  }

  const intFlag = (flag: string): number | undefined => {
    const raw = values.get(flag);
    return raw === undefined ? undefined : toInt(flag, raw);
  };

  return {
    kind: 'scan',
    options: {
      mode: values.get('--mode'),
      ipListPath: values.get('--ip-list'),
      limit: intFlag('--limit'),
      maxLatencyMs: intFlag('--max-latency'),
      outPath: values.get('--out'),
      tries: intFlag('--tries'),
      timeoutMs: intFlag('--timeout'),
      probeConcurrency: intFlag('--workers'),
      geoConcurrency: intFlag('--geo-workers'),
      tcpPort: intFlag('--port'),
    },
  };
}

export function createAddressSource(config: ScanConfig): AddressSource {
  return config.ipListPath !== undefined
    ? new FileRangeSource(config.ipListPath)
    : new RemoteRangeSource({ url: config.rangesUrl });
}

async function main(argv: readonly string[]): Promise<number> {
  loadDotenv();
  setLogLevel(parseLogLevel(process.env.LOG_LEVEL));

  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = resolveScanConfig(command.options, readEnvDefaults());
  const color = process.stdout.isTTY === true;
  const say = (code: string, text: string) =>
    process.stdout.write((color ? `${code}${text}${Ansi.ENDC}` : text) + '\n');

  const source = createAddressSource(config);
  say(Ansi.CYAN, `Loading IP ranges from ${source.description}...`);
  const targets = await source.produce();
  say(Ansi.GREEN, `Found ${targets.length} unique IP addresses to test.\n`);

  const summary = await executeScan(targets, config, {
    strategy: createProbeStrategy(config),
    geo: new IpInfoGeoLookup({ baseUrl: config.geoBaseUrl, timeoutMs: config.geoTimeoutMs }),
    renderer: new Renderer(process.stdout, { color }),
    holdLogs: color && process.stderr.isTTY === true,
  });

  if (config.outPath !== undefined) {
    const sink = new FileOutputSink(config.outPath);
    await sink.write(summary.leaderboard);
    say(Ansi.GREEN, `Results saved to ${sink.destination}`);
    info(`Saved ${summary.leaderboard.length} entries`, { module: 'cli', scanId: summary.scanId });
  }
  return 0;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    // argv[1] is not a file on disk (REPL, -e), so this module was imported
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      if (err instanceof ConfigError) {
        process.stderr.write(`${err.message}\n${USAGE}`);
      } else if (err instanceof ScanError) {
        process.stderr.write(`${Ansi.RED}Error: ${err.message}${Ansi.ENDC}\n`);
        logError(err.message, { module: 'cli', error: err });
      } else {
        logError(`Fatal error: ${describeError(err)}`, { module: 'cli', error: err });
      }
      process.exit(1);
    });
}
