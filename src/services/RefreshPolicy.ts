// src/services/RefreshPolicy.ts
import {
  clampInterval,
  DEFAULT_INTERVALS,
  INTERVAL_BOUNDS,
  IntervalBounds,
} from 'App/config/config';
import { Category, CATEGORY_ORDER } from 'App/types/metrics';
import { EventEmitter } from 'node:events';

/** Lower bound on the scheduler wake-up period. */
export const MIN_TICK_MS = 1000;

export interface IntervalView {
  category: Category;
  seconds: number;
  bounds: IntervalBounds;
}

/**
 * Per-category refresh intervals and the time each category was last sampled.
 *
 * Owned by the monitor service and handed to both the scheduler (reads on every tick)
 * and the settings handler (writes). Nothing here awaits, so every read/modify/write
 * completes within one turn of the event loop.
 *
 * Emits `change` after any interval update.
 */
export class RefreshPolicy extends EventEmitter {
  private readonly intervals: Record<Category, number>;
  private readonly lastSampled: Record<Category, number>;

  constructor(initial: Partial<Record<Category, number>> = {}) {
    super();
    this.intervals = { ...DEFAULT_INTERVALS };
    this.lastSampled = { ...DEFAULT_INTERVALS };
    for (const category of CATEGORY_ORDER) {
      const seconds = initial[category];
      if (seconds !== undefined) {
        this.intervals[category] = clampInterval(category, seconds);
      }
      this.lastSampled[category] = Number.NEGATIVE_INFINITY;
    }
  }

  /** Interval in seconds. */
  getInterval(category: Category): number {
    return this.intervals[category];
  }

  getLastSampled(category: Category): number {
    return this.lastSampled[category];
  }

  isDue(category: Category, now: number): boolean {
    return now - this.lastSampled[category] >= this.intervals[category] * 1000;
  }

  markSampled(category: Category, now: number) {
    this.lastSampled[category] = now;
  }

  /**
   * Sets one interval (clamped to the category bounds) and makes the category due
   * on the very next tick. Returns the applied value.
   */
  setIntervalSeconds(category: Category, seconds: number): number {
    const applied = this.apply(category, seconds);
    this.emit('change', this.toJSON());
    return applied;
  }

  /** Applies several intervals at once; emits a single `change`. */
  update(values: Partial<Record<Category, number>>): Record<Category, number> {
    let touched = false;
    for (const category of CATEGORY_ORDER) {
      const seconds = values[category];
      if (seconds === undefined) continue;
      this.apply(category, seconds);
      touched = true;
    }
    if (touched) this.emit('change', this.toJSON());
    return { ...this.intervals };
  }

  /** Wake-up period: the finest interval, floored at MIN_TICK_MS. */
  tickPeriodMs(): number {
    const finest = Math.min(...CATEGORY_ORDER.map(c => this.intervals[c]));
    return Math.max(MIN_TICK_MS, finest * 1000);
  }

  /** Settings view (used by the page and GET /api/intervals). */
  describe(): IntervalView[] {
    return CATEGORY_ORDER.map(category => ({
      category,
      seconds: this.intervals[category],
      bounds: INTERVAL_BOUNDS[category],
    }));
  }

  toJSON(): Record<Category, number> {
    return { ...this.intervals };
  }

  private apply(category: Category, seconds: number): number {
    const applied = clampInterval(category, seconds);
    this.intervals[category] = applied;
    this.lastSampled[category] = Number.NEGATIVE_INFINITY;
    return applied;
  }
}
