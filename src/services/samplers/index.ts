// src/services/samplers/index.ts
import { CpuSampler } from './CpuSampler';
import { DiskSampler } from './DiskSampler';
import { GpuBackend, GpuSampler } from './GpuSampler';
import { MemorySampler } from './MemorySampler';
import { NetworkSampler } from './NetworkSampler';
import { ProcessSampler } from './ProcessSampler';
import { TemperatureSampler } from './TemperatureSampler';
import { SamplerSet } from './BaseSampler';

export type { Sampler, SamplerSet } from './BaseSampler';
export { probeGpuBackend } from './GpuSampler';
export type { GpuBackend } from './GpuSampler';

/** Host samplers backed by systeminformation, with the GPU backend picked at startup. */
export const createHostSamplers = (gpu: GpuBackend): SamplerSet => ({
  cpu: new CpuSampler(),
  memory: new MemorySampler(),
  disk: new DiskSampler(),
  network: new NetworkSampler(),
  process: new ProcessSampler(),
  gpu: new GpuSampler(gpu),
  temperature: new TemperatureSampler(),
});
