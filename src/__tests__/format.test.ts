import { describe, expect, it } from '@jest/globals';
import {
  formatBandwidth,
  formatBytes,
  formatClock,
  formatPercent,
  formatUptime,
  temperatureLevel,
  usageLevel,
} from 'App/utils/format';

describe('format utils', () => {
  it('formats byte counts in binary units', () => {
    expect(formatBytes(512)).toBe('512.0 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(2 * 1024 ** 3)).toBe('2.0 GB');
  });

  it('formats bandwidth', () => {
    expect(formatBandwidth(500)).toBe('500 B/s');
    expect(formatBandwidth(2048)).toBe('2.0 KB/s');
    expect(formatBandwidth(1.5 * 1024 ** 2)).toBe('1.5 MB/s');
  });

  it('formats uptime with the largest useful unit first', () => {
    const since = new Date(0);
    expect(formatUptime(since, new Date((2 * 1440 + 3 * 60 + 4) * 60_000))).toBe('2d 3h 4m');
    expect(formatUptime(since, new Date(65 * 60_000))).toBe('1h 5m');
    expect(formatUptime(since, new Date(59_000))).toBe('0m');
  });

  it('formats percentages and clock times', () => {
    expect(formatPercent(12.34)).toBe('12.3%');
    expect(formatClock(new Date(2024, 5, 30, 23, 0, 9).getTime())).toBe('23:00:09');
  });

  it('bands usage and temperature', () => {
    expect(usageLevel(49.9)).toBe('ok');
    expect(usageLevel(50)).toBe('warn');
    expect(usageLevel(80)).toBe('crit');
    expect(temperatureLevel(69)).toBe('ok');
    expect(temperatureLevel(70)).toBe('warn');
    expect(temperatureLevel(85)).toBe('crit');
    expect(temperatureLevel(90, 95)).toBe('warn');
  });
});
