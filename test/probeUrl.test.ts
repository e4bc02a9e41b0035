import { afterEach, describe, expect, it } from 'vitest';
import { createServer as createHttpServer } from 'node:http';
import { createServer as createNetServer, type Server as NetServer, type Socket } from 'node:net';

import { ProbeClientPool } from '../src/precheck/network/clientPool.js';
import { probeUrl, type ProbeOptions } from '../src/precheck/network/probeUrl.js';
import type { Verdict } from '../src/types.js';

const options: ProbeOptions = { retries: 1, backoffMs: 0, userAgent: 'crawl-seeds-test' };

const servers: NetServer[] = [];
const sockets = new Set<Socket>();
let pool: ProbeClientPool | undefined;

async function listen(server: NetServer): Promise<string> {
  servers.push(server);
  server.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  if (typeof address === 'object' && address && typeof address.port === 'number') {
    return `http://127.0.0.1:${address.port}`;
  }
  throw new Error('Unable to determine server address for tests.');
}

async function probe(url: string): Promise<Verdict | null> {
  pool = new ProbeClientPool(1, { connectTimeoutMs: 5_000, readTimeoutMs: 5_000 });
  return pool.use((client) => probeUrl(url, client, options));
}

afterEach(async () => {
  await pool?.close();
  pool = undefined;
  for (const socket of sockets) {
    socket.destroy();
  }
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve) => {
          server.close(() => resolve());
        }),
    ),
  );
});

describe('probeUrl', () => {
  it('treats a successful response as reachable', async () => {
    const baseUrl = await listen(
      createHttpServer((_req, res) => {
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.end('<html><body>ok</body></html>');
      }),
    );

    await expect(probe(`${baseUrl}/`)).resolves.toBeNull();
  });

  it('treats HTTP errors as reachable without retrying', async () => {
    let requests = 0;
    const baseUrl = await listen(
      createHttpServer((_req, res) => {
        requests += 1;
        res.statusCode = 503;
        res.end('Service Unavailable');
      }),
    );

    await expect(probe(`${baseUrl}/down`)).resolves.toBeNull();
    expect(requests).toBe(1);
  });

  it('retries and reports connections closed by the server', async () => {
    let requests = 0;
    const baseUrl = await listen(
      createHttpServer((req) => {
        requests += 1;
        req.socket.destroy();
      }),
    );

    await expect(probe(`${baseUrl}/reset`)).resolves.toBe('connection-reset');
    expect(requests).toBe(2);
  });

  it('treats protocol errors as reachable', async () => {
    let connections = 0;
    const baseUrl = await listen(
      createNetServer((socket) => {
        connections += 1;
        socket.on('data', () => {
          socket.write('this is not http\r\n\r\n');
        });
      }),
    );

    await expect(probe(`${baseUrl}/garbage`)).resolves.toBeNull();
    expect(connections).toBe(1);
  });
});
