// src/services/MonitorService.ts
import { GPU_BACKEND, SHUTDOWN_GRACE_MS } from 'App/config/config';
import { Category, SnapshotSet } from 'App/types/metrics';
import { ConnectionState, ShutdownMessage, StreamTransport } from 'App/types/stream';
import { BroadcastRegistry } from './BroadcastRegistry';
import { MonitorScheduler, SchedulerOptions } from './MonitorScheduler';
import { RefreshPolicy } from './RefreshPolicy';
import { createHostSamplers, probeGpuBackend, SamplerSet } from './samplers';
import { StreamConnection, StreamConnectionOptions } from './StreamConnection';
import { SystemInfoService } from './SystemInfoService';

export interface MonitorServiceDeps {
  samplers: SamplerSet;
  policy?: RefreshPolicy;
  registry?: BroadcastRegistry;
  systemInfo?: SystemInfoService;
  scheduler?: SchedulerOptions;
  stream?: StreamConnectionOptions;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Owns the refresh policy, the subscriber registry, the samplers, the scheduler and
 * the live viewer connections. Routes and the Socket.IO provider go through it.
 */
export class MonitorService {
  readonly policy: RefreshPolicy;
  readonly registry: BroadcastRegistry;
  readonly systemInfo: SystemInfoService;
  readonly scheduler: MonitorScheduler;
  private readonly samplers: SamplerSet;
  private readonly streamOptions: StreamConnectionOptions;
  private readonly connections = new Map<StreamConnection, Promise<ConnectionState>>();
  private shuttingDown = false;

  constructor(deps: MonitorServiceDeps) {
    this.samplers = deps.samplers;
    this.policy = deps.policy ?? new RefreshPolicy();
    this.registry = deps.registry ?? new BroadcastRegistry();
    this.systemInfo = deps.systemInfo ?? new SystemInfoService();
    this.streamOptions = deps.stream ?? {};
    this.scheduler = new MonitorScheduler(
      this.policy,
      this.samplers,
      this.registry,
      deps.scheduler,
    );
  }

  /** Probes the GPU once and wires the systeminformation-backed samplers. */
  static async createForHost(): Promise<MonitorService> {
    const gpu = await probeGpuBackend({ setting: GPU_BACKEND });
    console.log(`[GPU] Using backend: ${gpu.kind}`);
    return new MonitorService({ samplers: createHostSamplers(gpu) });
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  start() {
    this.scheduler.start();
  }

  /**
   * One snapshot per category for a full page render. The refresh policy is left
   * alone; only scheduler ticks mark categories sampled.
   */
  async snapshotAll(): Promise<SnapshotSet> {
    const s = this.samplers;
    const [cpu, memory, disk, network, process, gpu, temperature] = await Promise.all([
      s.cpu.sample(),
      s.memory.sample(),
      s.disk.sample(),
      s.network.sample(),
      s.process.sample(),
      s.gpu.sample(),
      s.temperature.sample(),
    ]);
    return { cpu, memory, disk, network, process, gpu, temperature };
  }

  updateIntervals(values: Partial<Record<Category, number>>): Record<Category, number> {
    return this.policy.update(values);
  }

  /**
   * Starts a connection task for a transport and tracks it until it closes.
   * During shutdown the connection is refused straight away.
   */
  openConnection(transport: StreamTransport): StreamConnection {
    const connection = new StreamConnection(this.registry, transport, this.streamOptions);
    if (this.shuttingDown) connection.cancel('server');

    const task = connection.run().finally(() => {
      this.connections.delete(connection);
    });
    this.connections.set(connection, task);
    return connection;
  }

  /**
   * Stops sampling, tells every viewer the server is going away, gives them
   * `graceMs` to receive it, then cancels whatever is still open.
   */
  async shutdown(graceMs: number = SHUTDOWN_GRACE_MS): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    this.scheduler.stop();

    const message: ShutdownMessage = { type: 'shutdown', reason: 'Server is shutting down' };
    const notified = this.registry.broadcast(message);
    console.log(`[Shutdown] Notified ${notified} viewer(s)`);

    // even a zero grace lets queued notices reach the transports
    if (this.connections.size > 0) await sleep(Math.max(0, graceMs));

    for (const connection of this.connections.keys()) connection.cancel('server');
    this.registry.closeAll('server');
    await Promise.allSettled(this.connections.values());
  }
}
