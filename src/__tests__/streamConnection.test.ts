import { afterEach, describe, expect, it, jest } from '@jest/globals';
import { BroadcastRegistry } from 'App/services/BroadcastRegistry';
import { StreamConnection } from 'App/services/StreamConnection';
import { ShutdownMessage, UpdateMessage } from 'App/types/stream';
import { flush, RecordingTransport } from './helpers/fakes';

const update = (n: number): UpdateMessage => ({
  type: 'update',
  fragments: [{ target: 'last-update', swap: 'outerHTML', html: `<span>${n}</span>` }],
});

const shutdown: ShutdownMessage = { type: 'shutdown', reason: 'Server is shutting down' };

const open = (heartbeatMs = 60_000) => {
  const registry = new BroadcastRegistry(10);
  const transport = new RecordingTransport();
  const connection = new StreamConnection(registry, transport, { heartbeatMs });
  return { registry, transport, connection };
};

describe('StreamConnection', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('registers on run and forwards broadcasts in order', async () => {
    const { registry, transport, connection } = open();
    expect(connection.state).toBe('CONNECTING');

    const done = connection.run();
    expect(connection.state).toBe('ACTIVE');
    expect(registry.size).toBe(1);

    registry.broadcast(update(1));
    registry.broadcast(update(2));
    await flush(30);

    expect(transport.messages).toEqual([update(1), update(2)]);

    connection.cancel('client');
    expect(await done).toBe('CLOSED_BY_CLIENT');
    expect(registry.size).toBe(0);
    // the peer is gone, so nothing is written or closed after cancel
    expect(transport.events).toEqual([update(1), update(2)]);
  });

  it('sends heartbeats while the stream is idle', async () => {
    jest.useFakeTimers();
    const { transport, connection } = open(1000);
    const done = connection.run();

    await jest.advanceTimersByTimeAsync(2500);
    expect(transport.events).toEqual(['heartbeat', 'heartbeat']);

    connection.cancel('server');
    expect(await done).toBe('CLOSED_BY_SERVER');
    expect(transport.events).toEqual(['heartbeat', 'heartbeat', 'close']);
  });

  it('closes by server after delivering the shutdown notice', async () => {
    const { registry, transport, connection } = open();
    const done = connection.run();

    registry.broadcast(shutdown);

    expect(await done).toBe('CLOSED_BY_SERVER');
    expect(transport.events).toEqual([shutdown, 'close']);
    expect(registry.size).toBe(0);
  });

  it('ends in CLOSED_BY_ERROR when the transport write fails', async () => {
    const { registry, transport, connection } = open();
    transport.failOnSend = new Error('socket gone');
    const done = connection.run();

    registry.broadcast(update(1));

    expect(await done).toBe('CLOSED_BY_ERROR');
    expect(registry.size).toBe(0);
    expect(transport.events).toEqual(['close']);
  });

  it('lets the queue fill and drop while the peer is not reading', async () => {
    const registry = new BroadcastRegistry(2);
    const transport = new RecordingTransport();
    let release: () => void = () => undefined;
    transport.stalled = new Promise<void>(resolve => {
      release = resolve;
    });
    const connection = new StreamConnection(registry, transport, { heartbeatMs: 60_000 });
    const done = connection.run();

    const accepted: number[] = [];
    for (let n = 1; n <= 5; n += 1) {
      accepted.push(registry.broadcast(update(n)));
      await flush(30);
    }

    expect(accepted).toEqual([1, 1, 1, 0, 0]);
    expect(transport.messages).toEqual([update(1)]);

    release();
    await flush(50);
    expect(transport.messages).toEqual([update(1), update(2), update(3)]);

    connection.cancel('client');
    expect(await done).toBe('CLOSED_BY_CLIENT');
  });

  it('abandons a stalled write when cancelled', async () => {
    const { registry, transport, connection } = open();
    transport.stalled = new Promise<void>(() => undefined);
    const done = connection.run();
    registry.broadcast(update(1));
    await flush(30);

    connection.cancel('server');

    expect(await done).toBe('CLOSED_BY_SERVER');
    expect(transport.events).toEqual([update(1), 'close']);
    expect(registry.size).toBe(0);
  });

  it('honours a cancel that arrives before run', async () => {
    const { registry, transport, connection } = open();

    connection.cancel('server');

    expect(await connection.run()).toBe('CLOSED_BY_SERVER');
    expect(registry.size).toBe(0);
    expect(transport.events).toEqual(['close']);
  });

  it('closes when the registry closes every subscriber', async () => {
    const { registry, connection } = open();
    const done = connection.run();

    registry.closeAll('server');

    expect(await done).toBe('CLOSED_BY_SERVER');
    expect(connection.id).toBeDefined();
  });
});
