import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import { formatSseEvent } from 'App/providers/SseTransport';
import { createServer } from 'App/server';
import { BroadcastRegistry } from 'App/services/BroadcastRegistry';
import { MonitorService } from 'App/services/MonitorService';
import { ShutdownMessage, UpdateMessage } from 'App/types/stream';
import http, { IncomingMessage } from 'node:http';
import { io as ioClient, Socket as ClientSocket } from 'socket.io-client';
import { createFakeSamplers, createFakeSystemInfo } from './helpers/fakes';

// Real HTTP server on an ephemeral port with the SSE endpoint and Socket.IO attached

const waitFor = async (condition: () => boolean, timeoutMs = 3000) => {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) throw new Error('Timed out waiting for condition');
    await new Promise(resolve => setTimeout(resolve, 10));
  }
};

const message: UpdateMessage = {
  type: 'update',
  fragments: [
    { target: 'cpu-card', swap: 'outerHTML', html: '<section id="cpu-card">42%</section>' },
    { target: 'last-update', swap: 'outerHTML', html: '<span id="last-update">12:00:00</span>' },
  ],
};

describe('E2E stream delivery', () => {
  const monitor = new MonitorService({
    samplers: createFakeSamplers(),
    systemInfo: createFakeSystemInfo(),
    stream: { heartbeatMs: 60_000 },
  });
  const { server, io } = createServer(monitor);
  let baseUrl = '';

  beforeAll(async () => {
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('No TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await monitor.shutdown(0);
    await io.close();
  });

  it('streams updates over SSE and unregisters when the client leaves', async () => {
    const req = http.get(`${baseUrl}/stream_updates`);
    const res = await new Promise<IncomingMessage>(resolve => req.on('response', resolve));
    let body = '';
    res.setEncoding('utf8');
    res.on('data', (chunk: string) => {
      body += chunk;
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/event-stream/);
    await waitFor(() => body.startsWith('retry: 3000\n\n') && monitor.registry.size === 1);

    monitor.registry.broadcast(message);
    await waitFor(() => body.includes('event: update'));
    expect(body).toBe(`retry: 3000\n\n${formatSseEvent(message)}`);

    req.destroy();
    await waitFor(() => monitor.registry.size === 0);
  });

  it('streams updates over Socket.IO and ends them with a shutdown notice', async () => {
    const client: ClientSocket = ioClient(baseUrl, {
      transports: ['websocket'],
      forceNew: true,
      reconnection: false,
    });
    const updates: UpdateMessage[] = [];
    const notices: ShutdownMessage[] = [];
    let disconnected = false;
    client.on('update', (m: UpdateMessage) => updates.push(m));
    client.on('shutdown', (m: ShutdownMessage) => notices.push(m));
    client.on('disconnect', () => {
      disconnected = true;
    });

    await waitFor(() => client.connected && monitor.registry.size === 1);
    monitor.registry.broadcast(message);
    await waitFor(() => updates.length === 1);
    expect(updates[0]).toEqual(message);

    await monitor.shutdown(50);

    await waitFor(() => disconnected);
    expect(notices).toEqual([{ type: 'shutdown', reason: 'Server is shutting down' }]);
    expect(monitor.connectionCount).toBe(0);
    client.close();
  });
});

describe('E2E SSE slow client', () => {
  const monitor = new MonitorService({
    samplers: createFakeSamplers(),
    systemInfo: createFakeSystemInfo(),
    registry: new BroadcastRegistry(2),
    stream: { heartbeatMs: 60_000 },
  });
  const { server, io } = createServer(monitor);
  let baseUrl = '';

  beforeAll(async () => {
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('No TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await monitor.shutdown(0);
    await io.close();
  });

  it('drops updates for a client that stopped reading', async () => {
    const req = http.get(`${baseUrl}/stream_updates`);
    const res = await new Promise<IncomingMessage>(resolve => req.on('response', resolve));
    res.pause();
    await waitFor(() => monitor.registry.size === 1);

    const large: UpdateMessage = {
      type: 'update',
      fragments: [{ target: 'process-card', swap: 'outerHTML', html: 'x'.repeat(1024 * 1024) }],
    };
    let delivered = 0;
    for (let i = 0; i < 40; i += 1) {
      delivered += monitor.registry.broadcast(large);
      await new Promise(resolve => setTimeout(resolve, 10));
    }

    expect(delivered).toBeLessThan(40);
    expect(monitor.registry.size).toBe(1);

    req.destroy();
    await waitFor(() => monitor.registry.size === 0);
  }, 20_000);
});
