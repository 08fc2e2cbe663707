// src/controllers/StreamController.ts
import { ServiceUnavailableError } from 'App/errors/CustomError';
import { SseTransport } from 'App/providers/SseTransport';
import type { MonitorService } from 'App/services/MonitorService';
import { NextFunction, Request, Response } from 'express';

export class StreamController {
  constructor(private readonly monitor: MonitorService) {}

  /**
   * GET /stream_updates
   * Server-Sent Events: `update` batches, `shutdown`, and keep-alive comments.
   */
  stream = (req: Request, res: Response, next: NextFunction) => {
    if (this.monitor.isShuttingDown) {
      return next(new ServiceUnavailableError('Server is shutting down'));
    }
    const transport = new SseTransport(res);
    try {
      transport.open();
    } catch (err) {
      return next(err);
    }

    const connection = this.monitor.openConnection(transport);
    console.log(
      `[Stream] SSE client connected, id: ${connection.id ?? 'n/a'} (${this.monitor.registry.size} live)`,
    );
    // 'close' on the response fires when the peer goes away; after our own end() it is a no-op
    res.on('close', () => {
      connection.cancel('client');
      console.log(`[Stream] SSE client disconnected, id: ${connection.id ?? 'n/a'}`);
    });
  };
}
