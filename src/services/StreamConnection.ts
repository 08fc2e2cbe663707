// src/services/StreamConnection.ts
import { STREAM_HEARTBEAT_MS } from 'App/config/config';
import {
  CloseReason,
  ConnectionState,
  StreamTransport,
} from 'App/types/stream';
import { BroadcastRegistry, Subscriber } from './BroadcastRegistry';

export interface StreamConnectionOptions {
  heartbeatMs?: number;
}

/**
 * Drives one viewer connection:
 *
 *   CONNECTING → ACTIVE → CLOSED_BY_CLIENT | CLOSED_BY_ERROR | CLOSED_BY_SERVER
 *
 * While ACTIVE the task waits for either the next queued message or the heartbeat
 * timeout and writes the result to its transport, one write at a time. It never
 * touches a sampler.
 * Leaving ACTIVE unregisters the subscriber straight away; run() unregisters again
 * on its way out so cancellation and transport errors are covered too.
 */
export class StreamConnection {
  private _state: ConnectionState = 'CONNECTING';
  private subscriber: Subscriber | null = null;
  private readonly heartbeatMs: number;
  /** Set when cancel() arrives before run() has registered. */
  private earlyCancel: CloseReason | null = null;
  private resolveCancelled: () => void = () => undefined;
  /** Settles on cancel() so a write stuck behind a stalled peer is abandoned. */
  private readonly cancelled = new Promise<void>(resolve => {
    this.resolveCancelled = resolve;
  });

  constructor(
    private readonly registry: BroadcastRegistry,
    private readonly transport: StreamTransport,
    options: StreamConnectionOptions = {},
  ) {
    this.heartbeatMs = options.heartbeatMs ?? STREAM_HEARTBEAT_MS;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get id(): string | undefined {
    return this.subscriber?.id;
  }

  /** Resolves with the final state once the connection has closed. */
  async run(): Promise<ConnectionState> {
    if (this.earlyCancel) {
      this.transition(this.closedState(this.earlyCancel));
      this.safeClose();
      return this._state;
    }

    const subscriber = this.registry.register();
    this.subscriber = subscriber;
    this.transition('ACTIVE');

    try {
      while (this._state === 'ACTIVE') {
        const next = await subscriber.next(this.heartbeatMs);
        if (this._state !== 'ACTIVE') break;

        switch (next.kind) {
          case 'message':
            await this.untilCancelled(this.transport.send(next.message));
            if (this._state === 'ACTIVE' && next.message.type === 'shutdown') {
              this.transition('CLOSED_BY_SERVER');
            }
            break;
          case 'timeout':
            await this.untilCancelled(this.transport.heartbeat());
            break;
          case 'closed':
            this.transition(this.closedState(next.reason));
            break;
        }
      }
    } catch (e) {
      console.warn(
        `[Stream] ${this.transport.kind} connection ${subscriber.id} failed:`,
        e instanceof Error ? e.message : e,
      );
      this.transition('CLOSED_BY_ERROR');
    } finally {
      this.registry.unregister(subscriber);
      subscriber.close(this._state === 'CLOSED_BY_CLIENT' ? 'client' : 'server');
      this.safeClose();
    }
    return this._state;
  }

  /**
   * Ends the connection from outside the task: `client` when the peer went away,
   * `server` when the service is shutting down.
   */
  cancel(reason: CloseReason) {
    if (!this.subscriber) {
      this.earlyCancel ??= reason;
      return;
    }
    if (this._state !== 'ACTIVE') return;
    this.transition(this.closedState(reason));
    this.subscriber.close(reason);
    this.resolveCancelled();
  }

  /**
   * While a write waits on a slow peer the subscriber queue keeps filling, and
   * the registry drops for this viewer once it is full.
   */
  private untilCancelled(write: Promise<void>): Promise<void> {
    return Promise.race([write, this.cancelled]);
  }

  private closedState(reason: CloseReason): ConnectionState {
    return reason === 'client' ? 'CLOSED_BY_CLIENT' : 'CLOSED_BY_SERVER';
  }

  private transition(next: ConnectionState) {
    const prev = this._state;
    if (prev === next) return;
    this._state = next;
    if (prev === 'ACTIVE' && this.subscriber) {
      this.registry.unregister(this.subscriber);
    }
  }

  private safeClose() {
    if (this._state === 'CLOSED_BY_CLIENT') return;
    try {
      this.transport.close();
    } catch (e) {
      console.warn(
        `[Stream] Closing ${this.transport.kind} transport failed:`,
        e instanceof Error ? e.message : e,
      );
    }
  }
}
