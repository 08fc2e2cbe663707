import { afterEach, describe, expect, it, jest } from '@jest/globals';
import { BroadcastRegistry, Subscriber } from 'App/services/BroadcastRegistry';
import { ShutdownMessage, UpdateMessage } from 'App/types/stream';

const update = (n: number): UpdateMessage => ({
  type: 'update',
  fragments: [{ target: 'last-update', swap: 'outerHTML', html: `<span>${n}</span>` }],
});

const shutdown: ShutdownMessage = { type: 'shutdown', reason: 'Server is shutting down' };

describe('Subscriber', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('hands out queued messages in order', async () => {
    const s = new Subscriber(5);
    s.offer(update(1));
    s.offer(update(2));

    expect(await s.next(1000)).toEqual({ kind: 'message', message: update(1) });
    expect(await s.next(1000)).toEqual({ kind: 'message', message: update(2) });
  });

  it('wakes a waiting reader directly', async () => {
    const s = new Subscriber(5);
    const pending = s.next(1000);

    expect(s.offer(update(7))).toBe(true);
    expect(await pending).toEqual({ kind: 'message', message: update(7) });
    expect(s.pending).toBe(0);
  });

  it('reports a timeout after a quiet period', async () => {
    jest.useFakeTimers();
    const s = new Subscriber(5);
    const pending = s.next(250);

    jest.advanceTimersByTime(250);

    expect(await pending).toEqual({ kind: 'timeout' });
  });

  it('drops messages once the queue is full', () => {
    const s = new Subscriber(2);

    expect(s.offer(update(1))).toBe(true);
    expect(s.offer(update(2))).toBe(true);
    expect(s.offer(update(3))).toBe(false);
    expect(s.dropped).toBe(1);
    expect(s.pending).toBe(2);
  });

  it('queues a shutdown notice even when full', async () => {
    const s = new Subscriber(1);
    s.offer(update(1));

    expect(s.offer(update(2))).toBe(false);
    expect(s.offer(shutdown)).toBe(true);
    expect(s.pending).toBe(2);
    expect(await s.next(1000)).toEqual({ kind: 'message', message: update(1) });
    expect(await s.next(1000)).toEqual({ kind: 'message', message: shutdown });
  });

  it('wakes the reader on close and keeps the first reason', async () => {
    const s = new Subscriber(2);
    const pending = s.next(1000);

    s.close('client');
    s.close('server');

    expect(await pending).toEqual({ kind: 'closed', reason: 'client' });
    expect(await s.next(1000)).toEqual({ kind: 'closed', reason: 'client' });
    expect(s.offer(update(1))).toBe(false);
  });

  it('still drains messages queued before close', async () => {
    const s = new Subscriber(2);
    s.offer(shutdown);
    s.close('server');

    expect(await s.next(1000)).toEqual({ kind: 'message', message: shutdown });
    expect(await s.next(1000)).toEqual({ kind: 'closed', reason: 'server' });
  });

  it('refuses a second concurrent reader', async () => {
    const s = new Subscriber(2);
    const first = s.next(1000);

    await expect(s.next(1000)).rejects.toThrow('already has a reader');

    s.close('server');
    await first;
  });
});

describe('BroadcastRegistry', () => {
  it('delivers to every subscriber except the one whose queue is full', () => {
    const registry = new BroadcastRegistry(1);
    const a = registry.register();
    const b = registry.register();
    const c = registry.register();
    b.offer(update(0)); // b is now full

    const delivered = registry.broadcast(update(1));

    expect(delivered).toBe(2);
    expect(a.pending).toBe(1);
    expect(c.pending).toBe(1);
    expect(b.dropped).toBe(1);
  });

  it('reaches a full subscriber with the shutdown notice', () => {
    const registry = new BroadcastRegistry(1);
    const full = registry.register();
    registry.broadcast(update(1));

    expect(registry.broadcast(update(2))).toBe(0);
    expect(registry.broadcast(shutdown)).toBe(1);
    expect(full.pending).toBe(2);
    expect(full.dropped).toBe(1);
  });

  it('unregisters idempotently', () => {
    const registry = new BroadcastRegistry();
    const s = registry.register();

    expect(registry.size).toBe(1);
    expect(registry.unregister(s)).toBe(true);
    expect(registry.unregister(s)).toBe(false);
    expect(registry.has(s)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('never delivers to an unregistered subscriber', () => {
    const registry = new BroadcastRegistry();
    const kept = registry.register();
    const gone = registry.register();
    registry.unregister(gone);

    expect(registry.broadcast(update(1))).toBe(1);
    expect(kept.pending).toBe(1);
    expect(gone.pending).toBe(0);
  });

  it('closes every subscriber on closeAll', async () => {
    const registry = new BroadcastRegistry();
    const a = registry.register();
    const b = registry.register();

    registry.closeAll();

    expect(a.closed).toBe(true);
    expect(await b.next(1000)).toEqual({ kind: 'closed', reason: 'server' });
  });
});
