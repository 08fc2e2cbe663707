// src/services/MonitorScheduler.ts
import { SCHEDULER_ERROR_BACKOFF_MS } from 'App/config/config';
import { AnySnapshot, CATEGORY_ORDER } from 'App/types/metrics';
import { Fragment, UpdateMessage } from 'App/types/stream';
import { snapshotFragment, timestampFragment } from 'App/views/fragments';
import { BroadcastRegistry } from './BroadcastRegistry';
import { RefreshPolicy } from './RefreshPolicy';
import { SamplerSet } from './samplers';

export interface SchedulerOptions {
  clock?: () => number;
  errorBackoffMs?: number;
}

/**
 * The single producer of stream updates.
 *
 * Contract:
 * - Each tick samples the categories that are due, in CATEGORY_ORDER, and broadcasts
 *   them as one `update` batch followed by the timestamp fragment.
 * - A tick with nothing due broadcasts nothing.
 * - The loop never overlaps itself; its period is re-read from the policy on every
 *   iteration and a policy change re-arms the pending wake-up.
 * - A failing tick is logged and retried after a backoff; the loop keeps running.
 */
export class MonitorScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private tickRunning = false;
  private rescheduleAfterTick = false;
  private readonly clock: () => number;
  private readonly errorBackoffMs: number;
  private readonly onPolicyChange = () => this.reschedule();
  private completedTicks = 0;

  constructor(
    private readonly policy: RefreshPolicy,
    private readonly samplers: SamplerSet,
    private readonly registry: BroadcastRegistry,
    options: SchedulerOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
    this.errorBackoffMs = options.errorBackoffMs ?? SCHEDULER_ERROR_BACKOFF_MS;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Ticks completed by the loop, empty ones included. */
  get tickCount(): number {
    return this.completedTicks;
  }

  /**
   * Samples every due category and broadcasts the batch.
   * Returns the broadcast message, or null when nothing was due.
   */
  async tick(now: number = this.clock()): Promise<UpdateMessage | null> {
    const due = CATEGORY_ORDER.filter(c => this.policy.isDue(c, now));
    if (due.length === 0) return null;

    // marked up front: a slow sampler must not make its category due twice
    for (const category of due) this.policy.markSampled(category, now);

    const snapshots = await Promise.all(
      due.map((c): Promise<AnySnapshot> => this.samplers[c].sample()),
    );
    const fragments: Fragment[] = snapshots.map(snapshotFragment);
    fragments.push(timestampFragment(now));

    const message: UpdateMessage = { type: 'update', fragments };
    this.registry.broadcast(message);
    return message;
  }

  /** Starts the loop; the first tick runs immediately. */
  start() {
    if (this.running) return;
    this.running = true;
    this.policy.on('change', this.onPolicyChange);
    console.log(
      `[Scheduler] Started, tick every ${this.policy.tickPeriodMs()} ms (${JSON.stringify(this.policy.toJSON())})`,
    );
    this.arm(0);
  }

  stop() {
    if (!this.running) return;
    this.running = false;
    this.policy.off('change', this.onPolicyChange);
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    console.log('[Scheduler] Stopped');
  }

  /** Re-arms the pending wake-up so a changed interval takes effect right away. */
  private reschedule() {
    if (!this.running) return;
    if (this.tickRunning) {
      this.rescheduleAfterTick = true;
      return;
    }
    this.arm(0);
  }

  private arm(delayMs: number) {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.loop();
    }, delayMs);
    this.timer.unref();
  }

  private async loop() {
    if (!this.running || this.tickRunning) return;
    this.tickRunning = true;
    let delay: number;
    try {
      await this.tick();
      this.completedTicks += 1;
      delay = this.policy.tickPeriodMs();
    } catch (e) {
      console.error('[Scheduler] Tick failed:', e);
      delay = this.errorBackoffMs;
    } finally {
      this.tickRunning = false;
    }
    if (this.rescheduleAfterTick) {
      this.rescheduleAfterTick = false;
      delay = 0;
    }
    if (this.running) this.arm(delay);
  }
}
