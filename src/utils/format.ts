// src/utils/format.ts

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/** 1536 → "1.5 KB" (binary multiples). */
export const formatBytes = (bytes: number): string => {
  let value = bytes;
  for (const unit of BYTE_UNITS) {
    if (Math.abs(value) < 1024) return `${value.toFixed(1)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
};

export const formatBandwidth = (bytesPerSec: number): string => {
  if (bytesPerSec < 1024) return `${bytesPerSec.toFixed(0)} B/s`;
  if (bytesPerSec < 1024 ** 2) return `${(bytesPerSec / 1024).toFixed(1)} KB/s`;
  if (bytesPerSec < 1024 ** 3) return `${(bytesPerSec / 1024 ** 2).toFixed(1)} MB/s`;
  return `${(bytesPerSec / 1024 ** 3).toFixed(1)} GB/s`;
};

/** Uptime since `since` as "2d 3h 4m", "3h 4m" or "4m". */
export const formatUptime = (since: Date, now: Date = new Date()): string => {
  const totalMinutes = Math.max(0, Math.floor((now.getTime() - since.getTime()) / 60000));
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;
  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
};

export const formatPercent = (value: number): string => `${value.toFixed(1)}%`;

/** HH:MM:SS in local time. */
export const formatClock = (epochMs: number): string => {
  const d = new Date(epochMs);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

/** Severity band used to colour gauges. */
export type Level = 'ok' | 'warn' | 'crit';

export const usageLevel = (percent: number): Level =>
  percent < 50 ? 'ok' : percent < 80 ? 'warn' : 'crit';

export const temperatureLevel = (celsius: number, high = 85): Level =>
  celsius < 70 ? 'ok' : celsius < high ? 'warn' : 'crit';
