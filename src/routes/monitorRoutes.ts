// src/routes/monitorRoutes.ts
import { MonitorController } from 'App/controllers/MonitorController';
import { SettingsController } from 'App/controllers/SettingsController';
import type { MonitorService } from 'App/services/MonitorService';
import { Router } from 'express';

export const createMonitorRoutes = (monitor: MonitorService): Router => {
  const routes = Router();
  const monitorController = new MonitorController(monitor);
  const settingsController = new SettingsController(monitor);

  routes.get('/api/monitor/live', monitorController.live);
  routes.get('/api/system-info', monitorController.systemInfo);
  routes.get('/api/intervals', settingsController.list);

  return routes;
};
