// src/services/samplers/NetworkSampler.ts
import {
  available,
  ConnectionCounts,
  NetworkInterfaceStats,
  NetworkStats,
  SampleResult,
  unavailable,
} from 'App/types/metrics';
import * as si from 'systeminformation';
import { BaseSampler } from './BaseSampler';

export interface NetStatsEntry {
  iface: string;
  operstate: string;
  rx_bytes: number;
  tx_bytes: number;
}

export interface NetIfaceEntry {
  iface: string;
  ip4: string;
  ip6: string;
  internal: boolean;
}

export interface NetConnectionEntry {
  state: string;
}

export interface NetworkSource {
  networkStats(ifaces?: string): Promise<NetStatsEntry[]>;
  networkInterfaces(): Promise<NetIfaceEntry[] | NetIfaceEntry>;
  networkConnections(): Promise<NetConnectionEntry[]>;
}

/** Cumulative byte counters observed at one instant. */
export interface CounterReading {
  bytes: number;
  at: number; // epoch ms
}

/**
 * Bytes per second between two readings of a monotonically increasing counter.
 * A counter that went backwards (interface reset, wrap) or a non-positive time
 * step yields 0.
 */
export const computeRate = (
  previous: CounterReading | undefined,
  current: CounterReading,
): number => {
  if (!previous) return 0;
  const elapsedSec = (current.at - previous.at) / 1000;
  if (!(elapsedSec > 0)) return 0;
  return Math.max(0, (current.bytes - previous.bytes) / elapsedSec);
};

export const countConnections = (
  connections: readonly NetConnectionEntry[],
): ConnectionCounts => {
  const counts = { total: connections.length, established: 0, listen: 0, timeWait: 0 };
  for (const c of connections) {
    switch (c.state.toUpperCase()) {
      case 'ESTABLISHED':
        counts.established += 1;
        break;
      case 'LISTEN':
        counts.listen += 1;
        break;
      case 'TIME_WAIT':
        counts.timeWait += 1;
        break;
    }
  }
  return counts;
};

interface PreviousCounters {
  sent: CounterReading;
  recv: CounterReading;
}

/**
 * Per-interface throughput. The only stateful sampler: it keeps the previous
 * counters of each interface, and nothing else reads that cache.
 */
export class NetworkSampler extends BaseSampler<'network'> {
  readonly category = 'network' as const;
  private readonly previous = new Map<string, PreviousCounters>();

  constructor(
    private readonly source: NetworkSource = si,
    clock?: () => number,
  ) {
    super(clock);
  }

  protected async read(): Promise<SampleResult<NetworkStats>> {
    const [stats, ifaceData] = await Promise.all([
      this.source.networkStats('*'),
      this.source.networkInterfaces(),
    ]);
    const now = this.clock();
    const ifaces = Array.isArray(ifaceData) ? ifaceData : [ifaceData];
    const byName = new Map(ifaces.map(i => [i.iface, i]));

    const interfaces: NetworkInterfaceStats[] = [];
    const live = new Set<string>();

    for (const s of stats) {
      const meta = byName.get(s.iface);
      if (meta?.internal) continue;
      if (!Number.isFinite(s.rx_bytes) || !Number.isFinite(s.tx_bytes)) continue;

      const sent: CounterReading = { bytes: s.tx_bytes, at: now };
      const recv: CounterReading = { bytes: s.rx_bytes, at: now };
      const prev = this.previous.get(s.iface);
      this.previous.set(s.iface, { sent, recv });
      live.add(s.iface);

      interfaces.push({
        name: s.iface,
        ipAddresses: meta ? [meta.ip4, meta.ip6].filter(ip => ip !== '') : [],
        isUp: s.operstate === 'up',
        bytesSent: s.tx_bytes,
        bytesRecv: s.rx_bytes,
        bytesSentPerSec: computeRate(prev?.sent, sent),
        bytesRecvPerSec: computeRate(prev?.recv, recv),
      });
    }

    for (const name of this.previous.keys()) {
      if (!live.has(name)) this.previous.delete(name);
    }

    if (interfaces.length === 0) return unavailable('No network interfaces found');
    return available({ interfaces, connections: await this.readConnections() });
  }

  private async readConnections(): Promise<ConnectionCounts | null> {
    try {
      return countConnections(await this.source.networkConnections());
    } catch (e) {
      console.warn(
        '[Sampler] network connections unavailable:',
        e instanceof Error ? e.message : e,
      );
      return null;
    }
  }
}
