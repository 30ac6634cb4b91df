/*
 * =============================================================================
 * MODULE: addressSource.ts
 * =============================================================================
 * Produces the probe targets: the provider's published IPv4 ranges (fetched
 * from its API or read from a local file) expanded into individual addresses.
 *
 * Expansion rules
 *   • /24 and smaller blocks contribute every address, network and broadcast
 *     included (the provider answers on those too)
 *   • larger blocks contribute only addresses whose last 4 bits are zero
 *   • malformed ranges, host bits set, or non-IPv4 ranges are skipped
 *   • duplicates are removed, first-seen order kept
 * =============================================================================
 */

import { readFile } from 'node:fs/promises';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { httpGetJson } from '../net/httpClient.js';
import { AddressSourceError, describeError } from '../core/errors.js';
import { warn } from '../core/logger.js';

export interface AddressSource {
  /** Human-readable origin, used in progress messages. */
  readonly description: string;
  produce(): Promise<string[]>;
}

/* -------------------------------------------------------------------------- */
/*  IPv4 helpers                                                               */
/* -------------------------------------------------------------------------- */

const SPARSE_STEP = 16;
const FULL_EXPANSION_PREFIX = 24;

export interface Ipv4Network {
  network: number;
  prefix: number;
}

export function parseIpv4(text: string): number | null {
  const parts = text.split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return null;
    // Leading zeros are ambiguous (octal in some parsers)
    if (part.length > 1 && part.startsWith('0')) return null;
    const octet = Number(part);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function formatIpv4(value: number): string {
  return [value >>> 24, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff].join('.');
}

/** Throws on anything that is not a strict IPv4 network in CIDR notation. */
export function parseCidr(cidr: string): Ipv4Network {
  const segments = cidr.trim().split('/');
  if (segments.length > 2) {
    throw new Error(`'${cidr}' is not a valid CIDR range`);
  }
  const addressPart = segments[0];
  const prefixPart: string | undefined = segments[1];

  const network = parseIpv4(addressPart);
  if (network === null) {
    throw new Error(`'${addressPart}' is not an IPv4 address`);
  }

  let prefix = 32;
  if (prefixPart !== undefined) {
    prefix = /^\d{1,2}$/.test(prefixPart) ? Number(prefixPart) : Number.NaN;
    if (!(prefix <= 32)) {
      throw new Error(`'${prefixPart}' is not a valid prefix length`);
    }
  }

  const hostBits = 32 - prefix;
  const blockSize = 2 ** hostBits;
  if (network % blockSize !== 0) {
    throw new Error(`${cidr} has host bits set`);
  }
  return { network, prefix };
}

export function expandNetwork({ network, prefix }: Ipv4Network): string[] {
  const blockSize = 2 ** (32 - prefix);
  const step = prefix >= FULL_EXPANSION_PREFIX ? 1 : SPARSE_STEP;
  const addresses: string[] = [];
  for (let offset = 0; offset < blockSize; offset += step) {
    addresses.push(formatIpv4(network + offset));
  }
  return addresses;
}

export function expandCidrs(cidrs: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const cidr of cidrs) {
    let range: Ipv4Network;
    try {
      range = parseCidr(cidr);
    } catch (err) {
      warn(`Could not parse CIDR ${cidr}: ${describeError(err)}`, { module: 'addressSource' });
      continue;
    }
    for (const address of expandNetwork(range)) {
      seen.add(address);
    }
  }
  return [...seen];
}

/** Splits a comma and/or newline delimited list, dropping blanks. */
export function splitRangeList(content: string): string[] {
  return content
    .replace(/,/g, '\n')
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function requireTargets(addresses: string[], origin: string): string[] {
  if (addresses.length === 0) {
    throw new AddressSourceError(`No valid IPv4 addresses could be derived from ${origin}`);
  }
  return addresses;
}

/* -------------------------------------------------------------------------- */
/*  Sources                                                                    */
/* -------------------------------------------------------------------------- */

const RangeListSchema = z.object({
  success: z.boolean(),
  result: z
    .object({
      ipv4_cidrs: z.array(z.string()).optional(),
    })
    .nullable()
    .optional(),
});

export interface RemoteRangeSourceOptions {
  url: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

export class RemoteRangeSource implements AddressSource {
  readonly description: string;

  constructor(private readonly options: RemoteRangeSourceOptions) {
    this.description = options.url;
  }

  async fetchRanges(): Promise<string[]> {
    let payload: z.infer<typeof RangeListSchema>;
    try {
      payload = await httpGetJson(this.options.url, RangeListSchema, {
        totalTimeoutMs: this.options.timeoutMs ?? 10_000,
        dispatcher: this.options.dispatcher,
      });
    } catch (err) {
      throw new AddressSourceError(`Error fetching IP ranges: ${describeError(err)}`, { cause: err });
    }

    const cidrs = payload.result?.ipv4_cidrs;
    if (!payload.success || !cidrs) {
      throw new AddressSourceError('Could not fetch IP ranges: response was not successful');
    }
    return cidrs;
  }

  async produce(): Promise<string[]> {
    const cidrs = await this.fetchRanges();
    return requireTargets(expandCidrs(cidrs), this.description);
  }
}

export class FileRangeSource implements AddressSource {
  readonly description: string;

  constructor(private readonly path: string) {
    this.description = path;
  }

  async produce(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (err) {
      throw new AddressSourceError(`Could not read IP ranges from ${this.path}: ${describeError(err)}`, {
        cause: err,
      });
    }
    return requireTargets(expandCidrs(splitRangeList(content)), this.description);
  }
}
