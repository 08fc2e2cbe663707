// src/types/metrics.ts

/* -------------------------------------------------------------------------------------------------
 * Categories
 * ------------------------------------------------------------------------------------------------- */

/** Emission order within a tick. */
export const CATEGORY_ORDER = [
  'cpu',
  'memory',
  'disk',
  'network',
  'process',
  'gpu',
  'temperature',
] as const;

export type Category = (typeof CATEGORY_ORDER)[number];

/* -------------------------------------------------------------------------------------------------
 * Per-category data
 * ------------------------------------------------------------------------------------------------- */

export interface CpuStats {
  readonly percent: number;
  readonly perCore: readonly number[];
  readonly frequencyMhz: number | null;
  readonly frequencyMinMhz: number | null;
  readonly frequencyMaxMhz: number | null;
  /** 1, 5 and 15 minute load averages. Always zeros on Windows. */
  readonly loadAvg: readonly [number, number, number];
}

export interface MemoryStats {
  readonly total: number;
  readonly available: number;
  readonly used: number;
  readonly percent: number;
  readonly swapTotal: number;
  readonly swapUsed: number;
  readonly swapPercent: number;
}

export interface DiskUsage {
  readonly device: string;
  readonly mountpoint: string;
  readonly fstype: string;
  readonly total: number;
  readonly used: number;
  readonly free: number;
  readonly percent: number;
}

export interface DiskStats {
  readonly disks: readonly DiskUsage[];
}

export interface NetworkInterfaceStats {
  readonly name: string;
  readonly ipAddresses: readonly string[];
  readonly isUp: boolean;
  readonly bytesSent: number;
  readonly bytesRecv: number;
  readonly bytesSentPerSec: number;
  readonly bytesRecvPerSec: number;
}

export interface ConnectionCounts {
  readonly total: number;
  readonly established: number;
  readonly listen: number;
  readonly timeWait: number;
}

export interface NetworkStats {
  readonly interfaces: readonly NetworkInterfaceStats[];
  /** null when the connection table could not be read (e.g. missing permissions). */
  readonly connections: ConnectionCounts | null;
}

export interface ProcessEntry {
  readonly pid: number;
  readonly name: string;
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly memoryMb: number;
  readonly username: string;
  readonly status: string;
}

export interface ProcessStats {
  readonly topCpu: readonly ProcessEntry[];
  readonly topMemory: readonly ProcessEntry[];
  readonly total: number;
  readonly statusCounts: Readonly<Record<string, number>>;
}

export type GpuBackendKind = 'systeminformation' | 'nvidia-smi' | 'none';

export interface GpuDevice {
  readonly id: number;
  readonly name: string;
  readonly utilization: number | null;
  readonly memoryUsedMb: number | null;
  readonly memoryTotalMb: number | null;
  readonly temperature: number | null;
  readonly powerDraw: number | null;
  readonly powerLimit: number | null;
  readonly fanSpeed: number | null;
}

export interface GpuProcess {
  readonly pid: number;
  readonly name: string;
  readonly gpuMemoryMb: number;
  readonly deviceId: number;
}

export interface GpuStats {
  readonly backend: GpuBackendKind;
  readonly devices: readonly GpuDevice[];
  /** null when the backend cannot list compute processes. */
  readonly processes: readonly GpuProcess[] | null;
}

export type SensorType = 'cpu' | 'core' | 'socket' | 'chipset';

export interface TemperatureReading {
  readonly type: SensorType;
  readonly label: string;
  readonly current: number;
  readonly high: number | null;
  readonly critical: number | null;
}

export interface TemperatureStats {
  readonly sensors: readonly TemperatureReading[];
  readonly max: number;
}

export interface SnapshotDataMap {
  cpu: CpuStats;
  memory: MemoryStats;
  disk: DiskStats;
  network: NetworkStats;
  process: ProcessStats;
  gpu: GpuStats;
  temperature: TemperatureStats;
}

/* -------------------------------------------------------------------------------------------------
 * Snapshots
 * ------------------------------------------------------------------------------------------------- */

/** Outcome of reading one category from the host; absence is a value, not an exception. */
export type SampleResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string };

export const available = <T>(value: T): SampleResult<T> => ({ ok: true, value });

export const unavailable = <T>(reason: string): SampleResult<T> => ({
  ok: false,
  reason,
});

export type MetricSnapshot<C extends Category = Category> =
  | {
      readonly category: C;
      readonly timestamp: number; // epoch ms
      readonly status: 'ok';
      readonly data: SnapshotDataMap[C];
    }
  | {
      readonly category: C;
      readonly timestamp: number;
      readonly status: 'unavailable';
      readonly reason: string;
    };

/** Union of every concrete snapshot type; switching on `category` narrows it. */
export type AnySnapshot = { [C in Category]: MetricSnapshot<C> }[Category];

export type SnapshotSet = { [C in Category]: MetricSnapshot<C> };

/* -------------------------------------------------------------------------------------------------
 * Static system information
 * ------------------------------------------------------------------------------------------------- */

export interface StaticSystemInfo {
  readonly hostname: string;
  readonly os: string;
  readonly osRelease: string;
  readonly architecture: string;
  readonly processor: string;
  readonly cpuCount: number | null;
  readonly cpuCountLogical: number;
  readonly bootTime: string; // ISO
  readonly nodeVersion: string;
  readonly pid: number;
}

export interface SelfUsage {
  readonly cpuPercent: number;
  readonly rssMb: number;
  readonly uptimeSec: number;
}
