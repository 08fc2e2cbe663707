// src/services/samplers/DiskSampler.ts
import {
  available,
  DiskStats,
  DiskUsage,
  SampleResult,
  unavailable,
} from 'App/types/metrics';
import * as si from 'systeminformation';
import { BaseSampler, round1 } from './BaseSampler';

export interface FsSizeEntry {
  fs: string;
  type: string;
  size: number;
  used: number;
  available: number;
  mount: string;
}

export interface DiskSource {
  fsSize(): Promise<FsSizeEntry[]>;
}

/** Pseudo filesystems that never represent real storage. */
const IGNORED_FS_TYPES = new Set(['squashfs', 'tmpfs', 'devtmpfs', 'overlay', 'ramfs']);

/**
 * Mounted filesystems with their usage. Mounts that report no size (unmounted
 * mid-read, unreadable) are left out rather than failing the whole category.
 */
export class DiskSampler extends BaseSampler<'disk'> {
  readonly category = 'disk' as const;

  constructor(
    private readonly source: DiskSource = si,
    clock?: () => number,
  ) {
    super(clock);
  }

  protected async read(): Promise<SampleResult<DiskStats>> {
    const entries = await this.source.fsSize();
    const disks: DiskUsage[] = [];
    const seen = new Set<string>();

    for (const e of entries) {
      if (!(e.size > 0) || !Number.isFinite(e.used)) continue;
      if (IGNORED_FS_TYPES.has(e.type.toLowerCase())) continue;
      if (seen.has(e.mount)) continue;
      seen.add(e.mount);
      disks.push({
        device: e.fs,
        mountpoint: e.mount,
        fstype: e.type,
        total: e.size,
        used: e.used,
        free: Math.max(0, e.available),
        percent: round1((e.used / e.size) * 100),
      });
    }

    if (disks.length === 0) return unavailable('No readable disk partitions');
    return available({ disks });
  }
}
