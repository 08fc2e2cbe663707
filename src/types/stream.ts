// src/types/stream.ts

/** A renderable piece of the page addressed by element id. */
export interface Fragment {
  target: string;
  swap: 'outerHTML';
  html: string;
}

export interface UpdateMessage {
  type: 'update';
  /** Category fragments in emission order, then the timestamp fragment. Never empty. */
  fragments: Fragment[];
}

export interface ShutdownMessage {
  type: 'shutdown';
  reason: string;
}

export type StreamMessage = UpdateMessage | ShutdownMessage;

export type ConnectionState =
  | 'CONNECTING'
  | 'ACTIVE'
  | 'CLOSED_BY_CLIENT'
  | 'CLOSED_BY_ERROR'
  | 'CLOSED_BY_SERVER';

export type CloseReason = 'client' | 'server';

/**
 * Where a connection writes. `send` and `heartbeat` settle once the peer can take
 * more data, and reject on a broken socket.
 */
export interface StreamTransport {
  readonly kind: 'sse' | 'socket.io';
  send(message: StreamMessage): Promise<void>;
  heartbeat(): Promise<void>;
  close(): void;
}
