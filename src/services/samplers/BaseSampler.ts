// src/services/samplers/BaseSampler.ts
import {
  Category,
  MetricSnapshot,
  SampleResult,
  SnapshotDataMap,
} from 'App/types/metrics';

export interface Sampler<C extends Category> {
  readonly category: C;
  /** Never rejects; missing hardware or permissions yield an `unavailable` snapshot. */
  sample(): Promise<MetricSnapshot<C>>;
}

export type SamplerSet = { [C in Category]: Sampler<C> };

/**
 * Wraps a category reader so that absence of data and unexpected failures both
 * surface as an `unavailable` snapshot. Each distinct reason is logged once until
 * the category recovers.
 */
export abstract class BaseSampler<C extends Category> implements Sampler<C> {
  abstract readonly category: C;
  private lastReason: string | null = null;

  constructor(protected readonly clock: () => number = Date.now) {}

  protected abstract read(): Promise<SampleResult<SnapshotDataMap[C]>>;

  async sample(): Promise<MetricSnapshot<C>> {
    let result: SampleResult<SnapshotDataMap[C]>;
    try {
      result = await this.read();
    } catch (e) {
      result = {
        ok: false,
        reason: e instanceof Error ? e.message : String(e),
      };
    }
    const timestamp = this.clock();

    if (result.ok) {
      if (this.lastReason !== null) {
        console.log(`[Sampler] ${this.category} is available again`);
        this.lastReason = null;
      }
      return { category: this.category, timestamp, status: 'ok', data: result.value };
    }

    if (result.reason !== this.lastReason) {
      console.warn(`[Sampler] ${this.category} unavailable: ${result.reason}`);
      this.lastReason = result.reason;
    }
    return {
      category: this.category,
      timestamp,
      status: 'unavailable',
      reason: result.reason,
    };
  }
}

/** Finite number or null. */
export const numberOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export const round1 = (value: number): number => Math.round(value * 10) / 10;
