// src/services/SystemInfoService.ts
import { SelfUsage, StaticSystemInfo } from 'App/types/metrics';
import os from 'node:os';
import pidusage from 'pidusage';
import * as si from 'systeminformation';

export interface CpuInfoSource {
  cpu(): Promise<{ brand: string; manufacturer: string; physicalCores: number }>;
}

export type UsageReader = (pid: number) => Promise<{ cpu: number; memory: number }>;

/**
 * Host facts that do not change while the process runs, read once and kept by
 * this instance, plus the dashboard server's own resource usage.
 */
export class SystemInfoService {
  private cached: StaticSystemInfo | null = null;
  private pending: Promise<StaticSystemInfo> | null = null;

  constructor(
    private readonly cpuSource: CpuInfoSource = si,
    private readonly usage: UsageReader = pidusage,
  ) {}

  async getStaticInfo(): Promise<StaticSystemInfo> {
    if (this.cached) return this.cached;
    this.pending ??= this.load().then(info => {
      this.cached = info;
      return info;
    });
    return this.pending;
  }

  /** CPU % and RSS of this server process (pidusage), zeros when unreadable. */
  async getSelfUsage(): Promise<SelfUsage> {
    try {
      const stats = await this.usage(process.pid);
      return {
        cpuPercent: Math.round(stats.cpu * 10) / 10,
        rssMb: Math.round((stats.memory / (1024 * 1024)) * 10) / 10,
        uptimeSec: Math.round(process.uptime()),
      };
    } catch (e) {
      console.warn('[SystemInfo] pidusage failed:', e instanceof Error ? e.message : e);
      const rss = process.memoryUsage().rss;
      return {
        cpuPercent: 0,
        rssMb: Math.round((rss / (1024 * 1024)) * 10) / 10,
        uptimeSec: Math.round(process.uptime()),
      };
    }
  }

  private async load(): Promise<StaticSystemInfo> {
    const cpus = os.cpus();
    let processor = cpus[0]?.model?.trim() || 'Unknown';
    let cpuCount: number | null = null;
    try {
      const cpu = await this.cpuSource.cpu();
      if (cpu.brand) processor = `${cpu.manufacturer} ${cpu.brand}`.trim();
      cpuCount = cpu.physicalCores > 0 ? cpu.physicalCores : null;
    } catch (e) {
      console.warn('[SystemInfo] CPU details unavailable:', e instanceof Error ? e.message : e);
    }

    let hostname = 'Unknown';
    try {
      hostname = os.hostname();
    } catch (e) {
      console.warn('[SystemInfo] hostname unavailable:', e instanceof Error ? e.message : e);
    }

    return {
      hostname,
      os: os.type(),
      osRelease: os.release(),
      architecture: os.arch(),
      processor,
      cpuCount,
      cpuCountLogical: cpus.length,
      bootTime: new Date(Date.now() - os.uptime() * 1000).toISOString(),
      nodeVersion: process.versions.node,
      pid: process.pid,
    };
  }
}
