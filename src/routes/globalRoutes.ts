// src/routes/globalRoutes.ts
import { MonitorController } from 'App/controllers/MonitorController';
import { SettingsController } from 'App/controllers/SettingsController';
import { StreamController } from 'App/controllers/StreamController';
import type { MonitorService } from 'App/services/MonitorService';
import { RequestHandler, Router } from 'express';
// --------------------------------------------------------------

export interface GlobalRoutesOptions {
  /** Extra middleware in front of POST /update_intervals (rate limiting in production). */
  settingsGuards?: RequestHandler[];
}

/** Dashboard page, the SSE stream and the settings form target. */
export const createGlobalRoutes = (
  monitor: MonitorService,
  { settingsGuards = [] }: GlobalRoutesOptions = {},
): Router => {
  const routes = Router();
  const page = new MonitorController(monitor);
  const stream = new StreamController(monitor);
  const settings = new SettingsController(monitor);

  routes.get('/', page.page);
  routes.get('/stream_updates', stream.stream);
  routes.post('/update_intervals', ...settingsGuards, settings.update);

  return routes;
};
