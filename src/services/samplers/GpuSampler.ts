// src/services/samplers/GpuSampler.ts
import { GpuBackendSetting } from 'App/config/config';
import {
  available,
  GpuBackendKind,
  GpuDevice,
  GpuProcess,
  GpuStats,
  SampleResult,
  unavailable,
} from 'App/types/metrics';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import * as si from 'systeminformation';
import { BaseSampler, numberOrNull } from './BaseSampler';

/* -------------------------------------------------------------------------------------------------
 * Backends
 * ------------------------------------------------------------------------------------------------- */

/** A GPU telemetry capability, chosen once at startup by probeGpuBackend(). */
export interface GpuBackend {
  readonly kind: GpuBackendKind;
  readonly available: boolean;
  sample(): Promise<SampleResult<GpuStats>>;
}

export interface GraphicsControllerEntry {
  model: string;
  name?: string;
  vram?: number | null;
  utilizationGpu?: number | null;
  memoryUsed?: number | null;
  memoryTotal?: number | null;
  temperatureGpu?: number | null;
  powerDraw?: number | null;
  powerLimit?: number | null;
  fanSpeed?: number | null;
}

export interface GraphicsSource {
  graphics(): Promise<{ controllers: GraphicsControllerEntry[] }>;
}

export type CommandRunner = (file: string, args: string[]) => Promise<string>;

const execFileAsync = promisify(execFile);

export const defaultRunner: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, { timeout: 3000, windowsHide: true });
  return stdout;
};

const hasTelemetry = (c: GraphicsControllerEntry): boolean =>
  numberOrNull(c.utilizationGpu) !== null ||
  numberOrNull(c.temperatureGpu) !== null ||
  numberOrNull(c.memoryUsed) !== null;

/** Reads GPUs through the systeminformation graphics API. */
export class LibraryGpuBackend implements GpuBackend {
  readonly kind = 'systeminformation' as const;
  readonly available = true;

  constructor(private readonly source: GraphicsSource = si) {}

  async sample(): Promise<SampleResult<GpuStats>> {
    const { controllers } = await this.source.graphics();
    const devices: GpuDevice[] = controllers
      .filter(hasTelemetry)
      .map((c, id) => ({
        id,
        name: c.name || c.model,
        utilization: numberOrNull(c.utilizationGpu),
        memoryUsedMb: numberOrNull(c.memoryUsed),
        memoryTotalMb: numberOrNull(c.memoryTotal) ?? numberOrNull(c.vram),
        temperature: numberOrNull(c.temperatureGpu),
        powerDraw: numberOrNull(c.powerDraw),
        powerLimit: numberOrNull(c.powerLimit),
        fanSpeed: numberOrNull(c.fanSpeed),
      }));
    if (devices.length === 0) return unavailable('GPU stopped reporting telemetry');
    return available({ backend: this.kind, devices, processes: null });
  }
}

export const NVIDIA_SMI = 'nvidia-smi';

const GPU_QUERY_FIELDS = [
  'index',
  'name',
  'utilization.gpu',
  'memory.used',
  'memory.total',
  'temperature.gpu',
  'power.draw',
  'power.limit',
  'fan.speed',
  'uuid',
];

/** "[N/A]", "[Not Supported]" and blanks become null. */
export const parseSmiNumber = (raw: string | undefined): number | null => {
  const v = (raw ?? '').trim();
  if (v === '' || v.startsWith('[')) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
};

const csvRows = (stdout: string): string[][] =>
  stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line !== '')
    .map(line => line.split(',').map(cell => cell.trim()));

export interface ParsedSmiDevices {
  devices: GpuDevice[];
  uuidToIndex: Map<string, number>;
}

export const parseSmiDevices = (stdout: string): ParsedSmiDevices => {
  const devices: GpuDevice[] = [];
  const uuidToIndex = new Map<string, number>();

  for (const cells of csvRows(stdout)) {
    if (cells.length < GPU_QUERY_FIELDS.length) continue;
    const id = parseSmiNumber(cells[0]);
    if (id === null) continue;
    // the name may itself contain commas; every other column is fixed
    const tail = cells.slice(-8);
    const name = cells.slice(1, cells.length - 8).join(', ');
    devices.push({
      id,
      name,
      utilization: parseSmiNumber(tail[0]),
      memoryUsedMb: parseSmiNumber(tail[1]),
      memoryTotalMb: parseSmiNumber(tail[2]),
      temperature: parseSmiNumber(tail[3]),
      powerDraw: parseSmiNumber(tail[4]),
      powerLimit: parseSmiNumber(tail[5]),
      fanSpeed: parseSmiNumber(tail[6]),
    });
    uuidToIndex.set(tail[7], id);
  }
  return { devices, uuidToIndex };
};

export const parseSmiProcesses = (
  stdout: string,
  uuidToIndex: ReadonlyMap<string, number>,
): GpuProcess[] => {
  const processes: GpuProcess[] = [];
  for (const cells of csvRows(stdout)) {
    if (cells.length < 4) continue;
    const pid = parseSmiNumber(cells[0]);
    if (pid === null) continue;
    const uuid = cells[cells.length - 1];
    processes.push({
      pid,
      name: cells.slice(1, cells.length - 2).join(', '),
      gpuMemoryMb: parseSmiNumber(cells[cells.length - 2]) ?? 0,
      deviceId: uuidToIndex.get(uuid) ?? 0,
    });
  }
  return processes;
};

/** Reads NVIDIA GPUs by running the nvidia-smi command-line tool. */
export class CliGpuBackend implements GpuBackend {
  readonly kind = 'nvidia-smi' as const;
  readonly available = true;

  constructor(private readonly run: CommandRunner = defaultRunner) {}

  async sample(): Promise<SampleResult<GpuStats>> {
    const out = await this.run(NVIDIA_SMI, [
      `--query-gpu=${GPU_QUERY_FIELDS.join(',')}`,
      '--format=csv,noheader,nounits',
    ]);
    const { devices, uuidToIndex } = parseSmiDevices(out);
    if (devices.length === 0) return unavailable('nvidia-smi reported no GPUs');
    return available({
      backend: this.kind,
      devices,
      processes: await this.readProcesses(uuidToIndex),
    });
  }

  private async readProcesses(
    uuidToIndex: ReadonlyMap<string, number>,
  ): Promise<GpuProcess[] | null> {
    try {
      const out = await this.run(NVIDIA_SMI, [
        '--query-compute-apps=pid,process_name,used_memory,gpu_uuid',
        '--format=csv,noheader,nounits',
      ]);
      return parseSmiProcesses(out, uuidToIndex);
    } catch (e) {
      console.warn('[GPU] Compute process list unavailable:', e instanceof Error ? e.message : e);
      return null;
    }
  }
}

export class UnavailableGpuBackend implements GpuBackend {
  readonly kind = 'none' as const;
  readonly available = false;

  constructor(readonly reason: string = 'No supported GPU detected') {}

  async sample(): Promise<SampleResult<GpuStats>> {
    return unavailable(this.reason);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Probe
 * ------------------------------------------------------------------------------------------------- */

export interface GpuProbeOptions {
  setting?: GpuBackendSetting;
  graphics?: GraphicsSource;
  run?: CommandRunner;
}

const probeLibrary = async (graphics: GraphicsSource): Promise<boolean> => {
  try {
    const { controllers } = await graphics.graphics();
    return controllers.some(hasTelemetry);
  } catch (e) {
    console.warn('[GPU] Graphics library probe failed:', e instanceof Error ? e.message : e);
    return false;
  }
};

const probeCli = async (run: CommandRunner): Promise<boolean> => {
  try {
    const out = await run(NVIDIA_SMI, ['-L']);
    return out.trim() !== '';
  } catch {
    // nvidia-smi missing or no driver loaded
    return false;
  }
};

/**
 * Picks the GPU backend once: the graphics library when it reports live telemetry,
 * otherwise nvidia-smi, otherwise "unavailable". `setting` can pin one choice.
 */
export const probeGpuBackend = async ({
  setting = 'auto',
  graphics = si,
  run = defaultRunner,
}: GpuProbeOptions = {}): Promise<GpuBackend> => {
  if (setting === 'none') return new UnavailableGpuBackend('GPU monitoring disabled');

  if ((setting === 'auto' || setting === 'systeminformation') && (await probeLibrary(graphics))) {
    return new LibraryGpuBackend(graphics);
  }
  if ((setting === 'auto' || setting === 'nvidia-smi') && (await probeCli(run))) {
    return new CliGpuBackend(run);
  }
  return new UnavailableGpuBackend();
};

/* -------------------------------------------------------------------------------------------------
 * Sampler
 * ------------------------------------------------------------------------------------------------- */

export class GpuSampler extends BaseSampler<'gpu'> {
  readonly category = 'gpu' as const;

  constructor(
    readonly backend: GpuBackend,
    clock?: () => number,
  ) {
    super(clock);
  }

  protected read(): Promise<SampleResult<GpuStats>> {
    return this.backend.sample();
  }
}
