// src/providers/SseTransport.ts
import { StreamMessage, StreamTransport } from 'App/types/stream';
import { Response } from 'express';

/** Client reconnect delay hint sent with the stream preamble (ms). */
export const SSE_RETRY_MS = 3000;

/**
 * Formats one Server-Sent Events frame. `data` is JSON on a single line, so no
 * multi-line splitting is needed.
 */
export const formatSseEvent = (message: StreamMessage): string =>
  `event: ${message.type}\ndata: ${JSON.stringify(message)}\n\n`;

export const SSE_HEARTBEAT_FRAME = ': keep-alive\n\n';

/** Writes stream messages to an open `text/event-stream` response. */
export class SseTransport implements StreamTransport {
  readonly kind = 'sse' as const;

  constructor(private readonly res: Response) {}

  /** Sends the event-stream headers and the retry hint. */
  open() {
    this.res.status(200);
    this.res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache, no-transform',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    this.res.flushHeaders();
    this.res.write(`retry: ${SSE_RETRY_MS}\n\n`);
  }

  send(message: StreamMessage): Promise<void> {
    return this.write(formatSseEvent(message));
  }

  heartbeat(): Promise<void> {
    return this.write(SSE_HEARTBEAT_FRAME);
  }

  close() {
    if (!this.res.writableEnded) this.res.end();
  }

  /** Resolves once the socket buffer has drained below its high-water mark. */
  private async write(chunk: string): Promise<void> {
    const res = this.res;
    if (res.writableEnded || res.destroyed) {
      throw new Error('SSE response is no longer writable');
    }
    if (res.write(chunk)) return;

    await new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        res.off('drain', onDrain);
        res.off('close', onDrain);
        res.off('error', onError);
      };
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      res.on('drain', onDrain);
      res.on('close', onDrain);
      res.on('error', onError);
    });
  }
}
