// src/providers/WebSocketsProvider.ts
import type { MonitorService } from 'App/services/MonitorService';
import { StreamMessage, StreamTransport } from 'App/types/stream';
import type { Server as HttpServer } from 'node:http';
import { Server as SocketIOServer, Socket } from 'socket.io';

/** Forwards stream messages to one Socket.IO client. */
export class SocketTransport implements StreamTransport {
  readonly kind = 'socket.io' as const;

  constructor(private readonly socket: Socket) {}

  async send(message: StreamMessage): Promise<void> {
    this.ensureConnected();
    this.socket.emit(message.type, message);
    await this.writable();
  }

  async heartbeat(): Promise<void> {
    this.ensureConnected();
    this.socket.emit('heartbeat', { ts: Date.now() });
    await this.writable();
  }

  close() {
    if (this.socket.connected) this.socket.disconnect(true);
  }

  private ensureConnected() {
    if (this.socket.disconnected) {
      throw new Error(`Socket ${this.socket.id} is disconnected`);
    }
  }

  /** Waits while the engine transport is still busy with earlier packets. */
  private writable(): Promise<void> {
    const conn = this.socket.conn;
    const transport = conn.transport;
    if (transport.writable) return Promise.resolve();

    return new Promise<void>(resolve => {
      const done = () => {
        transport.off('drain', done);
        conn.off('upgrade', done);
        conn.off('close', done);
        resolve();
      };
      transport.on('drain', done);
      conn.on('upgrade', done);
      conn.on('close', done);
    });
  }
}

/**
 * Creates the Socket.IO server and turns every socket into a stream
 * subscriber of the monitor.
 */
export const initWebSockets = (
  server: HttpServer,
  monitor: MonitorService,
  corsOrigins: string[] = [],
): SocketIOServer => {
  const io = new SocketIOServer(server, {
    cors: {
      origin: corsOrigins.length === 0 ? true : corsOrigins,
      methods: ['GET'],
    },
  });

  io.on('connection', socket => {
    console.log(`[Stream] Socket.IO client connected, id: ${socket.id}`);
    const connection = monitor.openConnection(new SocketTransport(socket));

    socket.on('disconnect', reason => {
      console.log(`[Stream] Socket.IO client disconnected, id: ${socket.id} (${reason})`);
      connection.cancel('client');
    });
  });

  return io;
};
