import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { GEO_LOOKUP_FAILED, IpInfoGeoLookup } from '../modules/geoLookup.js';

describe('IpInfoGeoLookup', () => {
  let agent: MockAgent;
  let lookup: IpInfoGeoLookup;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    lookup = new IpInfoGeoLookup({ baseUrl: 'https://geo.example/', timeoutMs: 1000, dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  const intercept = (address: string) =>
    agent.get('https://geo.example').intercept({ path: `/${address}/json`, method: 'GET' });

  it('formats city and country', async () => {
    intercept('192.0.2.10').reply(200, { ip: '192.0.2.10', city: 'Frankfurt am Main', country: 'DE' });
    expect(await lookup.resolve('192.0.2.10')).toBe('Frankfurt am Main, DE');
  });

  it('fills missing fields with N/A', async () => {
    intercept('192.0.2.11').reply(200, { ip: '192.0.2.11', country: 'US' });
    expect(await lookup.resolve('192.0.2.11')).toBe('N/A, US');
  });

  it('returns the sentinel on an error status', async () => {
    intercept('192.0.2.12').reply(429, { error: 'rate limited' });
    expect(await lookup.resolve('192.0.2.12')).toBe(GEO_LOOKUP_FAILED);
  });

  it('returns the sentinel on a body that is not JSON', async () => {
    intercept('192.0.2.13').reply(200, '<html>oops</html>');
    expect(await lookup.resolve('192.0.2.13')).toBe(GEO_LOOKUP_FAILED);
  });

  it('returns the sentinel when the request cannot be made', async () => {
    intercept('192.0.2.14').replyWithError(new Error('socket hang up'));
    expect(await lookup.resolve('192.0.2.14')).toBe('Network Error');
  });
});
