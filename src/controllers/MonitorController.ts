// src/controllers/MonitorController.ts
import type { MonitorService } from 'App/services/MonitorService';
import { renderPage } from 'App/views/page';
import { NextFunction, Request, Response } from 'express';

export class MonitorController {
  constructor(private readonly monitor: MonitorService) {}

  /**
   * GET /
   * Full dashboard page, first paint included.
   */
  page = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const now = Date.now();
      const [snapshots, system] = await Promise.all([
        this.monitor.snapshotAll(),
        this.monitor.systemInfo.getStaticInfo(),
      ]);
      const body = renderPage({
        snapshots,
        system,
        intervals: this.monitor.policy.describe(),
        renderedAt: now,
      });
      return res.status(200).type('html').send(body);
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /api/monitor/live
   * One snapshot per category as JSON.
   */
  live = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await this.monitor.snapshotAll();
      return res.status(200).json({ success: true, data });
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /api/system-info
   * Static host facts plus the server's own usage.
   */
  systemInfo = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const [info, self] = await Promise.all([
        this.monitor.systemInfo.getStaticInfo(),
        this.monitor.systemInfo.getSelfUsage(),
      ]);
      return res.status(200).json({ success: true, data: { ...info, self } });
    } catch (err) {
      return next(err);
    }
  };
}
