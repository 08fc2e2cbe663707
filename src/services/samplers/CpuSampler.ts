// src/services/samplers/CpuSampler.ts
import { MAX_CPU_CORES } from 'App/config/config';
import { available, CpuStats, SampleResult } from 'App/types/metrics';
import os from 'node:os';
import * as si from 'systeminformation';
import { BaseSampler, numberOrNull, round1 } from './BaseSampler';

export interface CpuSource {
  currentLoad(): Promise<{ currentLoad: number; cpus: Array<{ load: number }> }>;
  /** Speeds in GHz. */
  cpuCurrentSpeed(): Promise<{ avg: number; min: number; max: number }>;
}

const toMhz = (ghz: number): number | null => {
  const v = numberOrNull(ghz);
  return v !== null && v > 0 ? Math.round(v * 1000) : null;
};

export class CpuSampler extends BaseSampler<'cpu'> {
  readonly category = 'cpu' as const;

  constructor(
    private readonly source: CpuSource = si,
    private readonly maxCores: number = MAX_CPU_CORES,
    clock?: () => number,
  ) {
    super(clock);
  }

  protected async read(): Promise<SampleResult<CpuStats>> {
    const [load, speed] = await Promise.all([
      this.source.currentLoad(),
      this.source.cpuCurrentSpeed(),
    ]);
    const [l1, l5, l15] = os.loadavg();

    return available({
      percent: round1(load.currentLoad),
      perCore: load.cpus.slice(0, this.maxCores).map(c => round1(c.load)),
      frequencyMhz: toMhz(speed.avg),
      frequencyMinMhz: toMhz(speed.min),
      frequencyMaxMhz: toMhz(speed.max),
      loadAvg: [l1, l5, l15],
    });
  }
}
