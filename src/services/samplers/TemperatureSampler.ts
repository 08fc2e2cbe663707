// src/services/samplers/TemperatureSampler.ts
import {
  available,
  SampleResult,
  TemperatureReading,
  TemperatureStats,
  unavailable,
} from 'App/types/metrics';
import * as si from 'systeminformation';
import { BaseSampler, numberOrNull, round1 } from './BaseSampler';

export interface CpuTemperatureEntry {
  main: number | null;
  cores: number[];
  max: number | null;
  socket?: number[];
  chipset?: number | null;
}

export interface TemperatureSource {
  cpuTemperature(): Promise<CpuTemperatureEntry>;
}

/** Readings outside this range are sensor noise (unset registers, -1 placeholders). */
const PLAUSIBLE_MIN = 1;
const PLAUSIBLE_MAX = 150;

const plausible = (value: unknown): number | null => {
  const v = numberOrNull(value);
  return v !== null && v >= PLAUSIBLE_MIN && v <= PLAUSIBLE_MAX ? round1(v) : null;
};

export const collectSensors = (t: CpuTemperatureEntry): TemperatureReading[] => {
  const sensors: TemperatureReading[] = [];
  const push = (type: TemperatureReading['type'], label: string, raw: unknown) => {
    const current = plausible(raw);
    if (current !== null) sensors.push({ type, label, current, high: null, critical: null });
  };

  push('cpu', 'Package', t.main);
  t.cores.forEach((c, i) => push('core', `Core ${i}`, c));
  (t.socket ?? []).forEach((s, i) => push('socket', `Socket ${i}`, s));
  push('chipset', 'Chipset', t.chipset);
  return sensors;
};

export class TemperatureSampler extends BaseSampler<'temperature'> {
  readonly category = 'temperature' as const;

  constructor(
    private readonly source: TemperatureSource = si,
    clock?: () => number,
  ) {
    super(clock);
  }

  protected async read(): Promise<SampleResult<TemperatureStats>> {
    const sensors = collectSensors(await this.source.cpuTemperature());
    if (sensors.length === 0) return unavailable('No temperature sensors detected');
    return available({
      sensors,
      max: Math.max(...sensors.map(s => s.current)),
    });
  }
}
