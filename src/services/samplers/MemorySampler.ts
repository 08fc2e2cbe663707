// src/services/samplers/MemorySampler.ts
import { available, MemoryStats, SampleResult, unavailable } from 'App/types/metrics';
import * as si from 'systeminformation';
import { BaseSampler, round1 } from './BaseSampler';

export interface MemorySource {
  mem(): Promise<{
    total: number;
    available: number;
    swaptotal: number;
    swapused: number;
  }>;
}

const percentOf = (part: number, whole: number): number =>
  whole > 0 ? round1((part / whole) * 100) : 0;

export class MemorySampler extends BaseSampler<'memory'> {
  readonly category = 'memory' as const;

  constructor(
    private readonly source: MemorySource = si,
    clock?: () => number,
  ) {
    super(clock);
  }

  protected async read(): Promise<SampleResult<MemoryStats>> {
    const m = await this.source.mem();
    if (!(m.total > 0)) return unavailable('Memory totals not reported');

    // "used" excludes reclaimable cache: total minus what is available to new work
    const used = Math.max(0, m.total - m.available);
    return available({
      total: m.total,
      available: m.available,
      used,
      percent: percentOf(used, m.total),
      swapTotal: m.swaptotal,
      swapUsed: m.swapused,
      swapPercent: percentOf(m.swapused, m.swaptotal),
    });
  }
}
