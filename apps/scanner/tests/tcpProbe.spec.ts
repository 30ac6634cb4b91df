import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { createServer, type Server } from 'node:net';
import { TcpProbe, connectOnce, type Connector } from '../modules/tcpProbe.js';

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address !== null && typeof address === 'object') resolve(address.port);
      else reject(new Error('server is not listening on a TCP port'));
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('connectOnce', () => {
  const server = createServer((socket) => socket.end());
  let port = 0;

  beforeAll(async () => {
    port = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it('times a handshake with a listening port', async () => {
    const latency = await connectOnce('127.0.0.1', port, 1000);
    expect(latency).not.toBeNull();
    expect(latency).toBeGreaterThanOrEqual(0);
    expect(latency).toBeLessThan(1000);
  });

  it('returns null when the port refuses connections', async () => {
    const closed = createServer();
    const closedPort = await listen(closed);
    await close(closed);

    expect(await connectOnce('127.0.0.1', closedPort, 1000)).toBeNull();
  });
});

describe('TcpProbe', () => {
  it('averages every attempt when all succeed', async () => {
    const samples = [10, 20, 30, 40];
    const connect = vi.fn<Connector>(async () => samples.shift() ?? null);
    const probe = new TcpProbe({ port: 8443, connect });

    expect(await probe.probe('192.0.2.10', 4, 500)).toBe(25);
    expect(connect).toHaveBeenCalledTimes(4);
    expect(connect).toHaveBeenCalledWith('192.0.2.10', 8443, 500);
  });

  it('stops at the first failed attempt and reports the address unreachable', async () => {
    const samples: Array<number | null> = [10, null, 30, 40];
    const connect = vi.fn<Connector>(async () => samples.shift() ?? null);
    const probe = new TcpProbe({ connect });

    expect(await probe.probe('192.0.2.10', 4, 500)).toBeNull();
    expect(connect).toHaveBeenCalledTimes(2);
  });

  it('connects to port 443 by default', () => {
    expect(new TcpProbe().port).toBe(443);
  });
});
