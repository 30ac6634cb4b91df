import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { httpGetJson } from '../net/httpClient.js';
import { debug } from '../core/logger.js';
import { describeError } from '../core/errors.js';

export const GEO_LOOKUP_FAILED = 'Network Error';

/** Resolves an address to a display location. Never rejects. */
export interface GeoLookup {
  resolve(address: string): Promise<string>;
}

const IpInfoSchema = z.object({
  city: z.string().optional(),
  country: z.string().optional(),
});

export interface IpInfoLookupOptions {
  baseUrl: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class IpInfoGeoLookup implements GeoLookup {
  private readonly baseUrl: string;

  constructor(private readonly options: IpInfoLookupOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async resolve(address: string): Promise<string> {
    const url = `${this.baseUrl}/${encodeURIComponent(address)}/json`;
    try {
      const data = await httpGetJson(url, IpInfoSchema, {
        totalTimeoutMs: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
      });
      return `${data.city || 'N/A'}, ${data.country || 'N/A'}`;
    } catch (err) {
      debug(`Location lookup failed: ${describeError(err)}`, { module: 'geoLookup', address });
      return GEO_LOOKUP_FAILED;
    }
  }
}
