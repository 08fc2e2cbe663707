// Shared stand-ins for host telemetry used across the tests
import type { CpuInfoSource, UsageReader } from 'App/services/SystemInfoService';
import { SystemInfoService } from 'App/services/SystemInfoService';
import type { Sampler } from 'App/services/samplers';
import {
  Category,
  MetricSnapshot,
  SnapshotDataMap,
} from 'App/types/metrics';
import { StreamMessage, StreamTransport } from 'App/types/stream';

export const SAMPLE_DATA: SnapshotDataMap = {
  cpu: {
    percent: 12.5,
    perCore: [10, 15],
    frequencyMhz: 2400,
    frequencyMinMhz: 800,
    frequencyMaxMhz: 3600,
    loadAvg: [0.5, 0.4, 0.3],
  },
  memory: {
    total: 8 * 1024 ** 3,
    available: 4 * 1024 ** 3,
    used: 4 * 1024 ** 3,
    percent: 50,
    swapTotal: 0,
    swapUsed: 0,
    swapPercent: 0,
  },
  disk: {
    disks: [
      {
        device: '/dev/sda1',
        mountpoint: '/',
        fstype: 'ext4',
        total: 1000,
        used: 400,
        free: 600,
        percent: 40,
      },
    ],
  },
  network: {
    interfaces: [
      {
        name: 'eth0',
        ipAddresses: ['10.0.0.2'],
        isUp: true,
        bytesSent: 1000,
        bytesRecv: 2000,
        bytesSentPerSec: 0,
        bytesRecvPerSec: 0,
      },
    ],
    connections: { total: 3, established: 1, listen: 1, timeWait: 1 },
  },
  process: {
    topCpu: [
      {
        pid: 42,
        name: 'worker',
        cpuPercent: 3,
        memoryPercent: 1,
        memoryMb: 12.5,
        username: 'app',
        status: 'running',
      },
    ],
    topMemory: [
      {
        pid: 42,
        name: 'worker',
        cpuPercent: 3,
        memoryPercent: 1,
        memoryMb: 12.5,
        username: 'app',
        status: 'running',
      },
    ],
    total: 1,
    statusCounts: { running: 1 },
  },
  gpu: {
    backend: 'nvidia-smi',
    devices: [
      {
        id: 0,
        name: 'Test GPU',
        utilization: 30,
        memoryUsedMb: 512,
        memoryTotalMb: 4096,
        temperature: 55,
        powerDraw: 40,
        powerLimit: 120,
        fanSpeed: 35,
      },
    ],
    processes: [],
  },
  temperature: {
    sensors: [{ type: 'cpu', label: 'Package', current: 45, high: null, critical: null }],
    max: 45,
  },
};

/** Returns fixed data (or an unavailable reason) and counts its calls. */
export class FakeSampler<C extends Category> implements Sampler<C> {
  calls = 0;
  failure: Error | null = null;
  reason = 'fake sensor missing';

  constructor(
    readonly category: C,
    public data: SnapshotDataMap[C] | null,
    private readonly clock: () => number = () => 0,
  ) {}

  async sample(): Promise<MetricSnapshot<C>> {
    this.calls += 1;
    if (this.failure) throw this.failure;
    const timestamp = this.clock();
    if (this.data === null) {
      return { category: this.category, timestamp, status: 'unavailable', reason: this.reason };
    }
    return { category: this.category, timestamp, status: 'ok', data: this.data };
  }
}

export type FakeSamplerSet = { [C in Category]: FakeSampler<C> };

export const createFakeSamplers = (): FakeSamplerSet => ({
  cpu: new FakeSampler('cpu', SAMPLE_DATA.cpu),
  memory: new FakeSampler('memory', SAMPLE_DATA.memory),
  disk: new FakeSampler('disk', SAMPLE_DATA.disk),
  network: new FakeSampler('network', SAMPLE_DATA.network),
  process: new FakeSampler('process', SAMPLE_DATA.process),
  gpu: new FakeSampler('gpu', null),
  temperature: new FakeSampler('temperature', SAMPLE_DATA.temperature),
});

export const fakeCpuInfo: CpuInfoSource = {
  cpu: async () => ({ brand: 'Test CPU', manufacturer: 'Acme', physicalCores: 4 }),
};

export const fakeUsage: UsageReader = async () => ({ cpu: 1.25, memory: 50 * 1024 * 1024 });

export const createFakeSystemInfo = () => new SystemInfoService(fakeCpuInfo, fakeUsage);

/** Records everything a connection writes. */
export class RecordingTransport implements StreamTransport {
  readonly kind = 'sse' as const;
  readonly events: Array<StreamMessage | 'heartbeat' | 'close'> = [];
  failOnSend: Error | null = null;
  /** While set, every send waits on it, like a peer that stopped reading. */
  stalled: Promise<void> | null = null;

  async send(message: StreamMessage): Promise<void> {
    if (this.failOnSend) throw this.failOnSend;
    this.events.push(message);
    if (this.stalled) await this.stalled;
  }

  async heartbeat(): Promise<void> {
    this.events.push('heartbeat');
  }

  close() {
    this.events.push('close');
  }

  get messages(): StreamMessage[] {
    return this.events.filter((e): e is StreamMessage => typeof e !== 'string');
  }
}

/** Lets pending promise callbacks run. */
export const flush = async (times = 5) => {
  for (let i = 0; i < times; i += 1) await Promise.resolve();
};
