/* eslint-disable prefer-destructuring */
import { NotFoundError } from 'App/errors/CustomError';
import { Category, CATEGORY_ORDER } from 'App/types/metrics';
import * as dotenv from 'dotenv';
import path from 'path';

const envPath = path.join(process.cwd(), '.env');

dotenv.config({ path: envPath });

const getEnvVariable = (key: string, defaultValue?: string): string => {
  const value = process.env[key];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new NotFoundError(`Missing environment variable: ${key}`);
  }
  return value;
};

const getEnvNumber = (key: string, defaultValue: number, min = 0): number => {
  const v = Number(getEnvVariable(key, String(defaultValue)));
  return Number.isFinite(v) && v >= min ? v : defaultValue;
};

export const PORT = getEnvNumber('PORT', 3000);

export const HOST = getEnvVariable('HOST', '127.0.0.1');

export const MODE = getEnvVariable('NODE_ENV', 'development');

/** Comma-separated allow-list for cross-origin API calls; empty allows any origin. */
export const CORS_ORIGINS: string[] = getEnvVariable('CORS_ORIGINS', '')
  .split(',')
  .map(origin => origin.trim())
  .filter(origin => origin !== '');

/** Maximum CPU cores shown in the per-core view. */
export const MAX_CPU_CORES = getEnvNumber('MAX_CPU_CORES', 32, 1);

/** Rows in each of the top-CPU / top-memory process lists. */
export const MAX_PROCESSES = getEnvNumber('MAX_PROCESSES', 5, 1);

export const STREAM_QUEUE_SIZE = getEnvNumber('STREAM_QUEUE_SIZE', 100, 1);

export const STREAM_HEARTBEAT_MS = getEnvNumber('STREAM_HEARTBEAT_MS', 15000, 100);

export const SHUTDOWN_GRACE_MS = getEnvNumber('SHUTDOWN_GRACE_MS', 500);

export const SCHEDULER_ERROR_BACKOFF_MS = getEnvNumber(
  'SCHEDULER_ERROR_BACKOFF_MS',
  1000,
  1,
);

export type GpuBackendSetting = 'auto' | 'systeminformation' | 'nvidia-smi' | 'none';

export const GPU_BACKEND: GpuBackendSetting = (() => {
  const raw = getEnvVariable('GPU_BACKEND', 'auto').toLowerCase();
  switch (raw) {
    case 'systeminformation':
    case 'nvidia-smi':
    case 'none':
      return raw;
    default:
      return 'auto';
  }
})();

/* -------------------------------------------------------------------------------------------------
 * Refresh intervals (seconds)
 * ------------------------------------------------------------------------------------------------- */

export interface IntervalBounds {
  min: number;
  max: number;
}

export const INTERVAL_BOUNDS: Readonly<Record<Category, IntervalBounds>> = {
  cpu: { min: 1, max: 30 },
  memory: { min: 1, max: 30 },
  disk: { min: 5, max: 60 },
  network: { min: 1, max: 30 },
  process: { min: 2, max: 60 },
  gpu: { min: 1, max: 30 },
  temperature: { min: 2, max: 60 },
};

const BUILTIN_INTERVALS: Readonly<Record<Category, number>> = {
  cpu: 2,
  memory: 2,
  disk: 10,
  network: 2,
  process: 5,
  gpu: 3,
  temperature: 5,
};

export const clampInterval = (category: Category, seconds: number): number => {
  const { min, max } = INTERVAL_BOUNDS[category];
  return Math.min(max, Math.max(min, Math.round(seconds)));
};

/** Defaults after REFRESH_<CATEGORY>_SEC overrides, clamped to each category's bounds. */
export const DEFAULT_INTERVALS: Readonly<Record<Category, number>> =
  CATEGORY_ORDER.reduce<Record<Category, number>>(
    (acc, category) => {
      const key = `REFRESH_${category.toUpperCase()}_SEC`;
      const v = getEnvNumber(key, BUILTIN_INTERVALS[category]);
      acc[category] = clampInterval(category, v);
      return acc;
    },
    { ...BUILTIN_INTERVALS },
  );
