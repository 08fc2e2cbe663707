// src/services/samplers/ProcessSampler.ts
import { MAX_PROCESSES } from 'App/config/config';
import {
  available,
  ProcessEntry,
  ProcessStats,
  SampleResult,
} from 'App/types/metrics';
import * as si from 'systeminformation';
import { BaseSampler, round1 } from './BaseSampler';

export interface ProcessListEntry {
  pid: number;
  name: string;
  cpu: number;
  mem: number; // percent of total memory
  memRss: number; // KiB
  user: string;
  state: string;
}

export interface ProcessSource {
  processes(): Promise<{ list: ProcessListEntry[] }>;
}

const MAX_NAME_LENGTH = 30;
const MAX_USER_LENGTH = 15;

/**
 * Maps one raw process row. Rows of processes that exited during the scan or
 * that we may not inspect come back without a pid or name; those are skipped.
 */
export const toProcessEntry = (p: ProcessListEntry): ProcessEntry | null => {
  if (!(p.pid > 0) || !p.name) return null;
  const cpu = Number.isFinite(p.cpu) ? p.cpu : 0;
  const mem = Number.isFinite(p.mem) ? p.mem : 0;
  return {
    pid: p.pid,
    name: p.name.slice(0, MAX_NAME_LENGTH),
    cpuPercent: round1(cpu),
    memoryPercent: round1(mem),
    memoryMb: Number.isFinite(p.memRss) ? round1(p.memRss / 1024) : 0,
    username: p.user ? p.user.slice(0, MAX_USER_LENGTH) : 'N/A',
    status: p.state || 'unknown',
  };
};

export class ProcessSampler extends BaseSampler<'process'> {
  readonly category = 'process' as const;

  constructor(
    private readonly source: ProcessSource = si,
    private readonly topN: number = MAX_PROCESSES,
    clock?: () => number,
  ) {
    super(clock);
  }

  protected async read(): Promise<SampleResult<ProcessStats>> {
    const { list } = await this.source.processes();

    const processes: ProcessEntry[] = [];
    for (const raw of list) {
      // idle kernel threads report neither CPU nor memory
      if (!(raw.cpu > 0 || raw.mem > 0)) continue;
      const entry = toProcessEntry(raw);
      if (entry) processes.push(entry);
    }

    const statusCounts: Record<string, number> = {};
    for (const p of processes) {
      statusCounts[p.status] = (statusCounts[p.status] ?? 0) + 1;
    }

    return available({
      topCpu: [...processes]
        .sort((a, b) => b.cpuPercent - a.cpuPercent)
        .slice(0, this.topN),
      topMemory: [...processes]
        .sort((a, b) => b.memoryPercent - a.memoryPercent)
        .slice(0, this.topN),
      total: processes.length,
      statusCounts,
    });
  }
}
