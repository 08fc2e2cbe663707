// src/views/fragments.ts
import {
  AnySnapshot,
  Category,
  CpuStats,
  DiskStats,
  GpuStats,
  MemoryStats,
  NetworkStats,
  ProcessEntry,
  ProcessStats,
  TemperatureStats,
} from 'App/types/metrics';
import { Fragment } from 'App/types/stream';
import {
  formatBandwidth,
  formatBytes,
  formatClock,
  formatPercent,
  temperatureLevel,
  usageLevel,
} from 'App/utils/format';
import { Html, html } from './html';

export const CATEGORY_TITLES: Readonly<Record<Category, string>> = {
  cpu: 'CPU',
  memory: 'Memory',
  disk: 'Disk Usage',
  network: 'Network',
  process: 'Processes',
  gpu: 'GPU',
  temperature: 'Temperature Sensors',
};

export const TIMESTAMP_TARGET = 'last-update';

export const fragmentTarget = (category: Category): string => `${category}-card`;

/* -------------------------------------------------------------------------------------------------
 * Building blocks
 * ------------------------------------------------------------------------------------------------- */

const gauge = (percent: number, label?: string): Html => html`
  <div class="gauge gauge-${usageLevel(percent)}">
    <div class="gauge-bar" style="width:${Math.min(100, Math.max(0, percent)).toFixed(1)}%"></div>
    <span class="gauge-label">${label ?? formatPercent(percent)}</span>
  </div>`;

const stat = (title: string, value: string): Html =>
  html`<div class="stat"><div class="stat-title">${title}</div><div class="stat-value">${value}</div></div>`;

const card = (category: Category, body: Html, badge?: string): Html => html`
<section id="${fragmentTarget(category)}" class="card">
  <header><h3>${CATEGORY_TITLES[category]}</h3>${badge ? html`<span class="badge">${badge}</span>` : ''}</header>
  ${body}
</section>`;

const na = (value: number | null, unit = ''): string =>
  value === null ? 'N/A' : `${value}${unit}`;

/* -------------------------------------------------------------------------------------------------
 * Categories
 * ------------------------------------------------------------------------------------------------- */

const cpuBody = (d: CpuStats): Html => html`
  ${gauge(d.percent)}
  <div class="stats">
    ${stat('Frequency', d.frequencyMhz === null ? 'N/A' : `${d.frequencyMhz} MHz`)}
    ${stat('Load avg', d.loadAvg.map(l => l.toFixed(2)).join(' / '))}
  </div>
  <div class="cores">
    ${d.perCore.map((p, i) => html`<div class="core"><span>${`Core ${i}`}</span>${gauge(p)}</div>`)}
  </div>`;

const memoryBody = (d: MemoryStats): Html => html`
  ${gauge(d.percent, `${formatBytes(d.used)} / ${formatBytes(d.total)}`)}
  <div class="stats">
    ${stat('Available', formatBytes(d.available))}
    ${stat('Used', formatPercent(d.percent))}
  </div>
  ${d.swapTotal > 0 ? html`<h4>Swap</h4>${gauge(d.swapPercent, `${formatBytes(d.swapUsed)} / ${formatBytes(d.swapTotal)}`)}` : ''}`;

/** At most five disks are listed. */
const diskBody = (d: DiskStats): Html => html`
  ${d.disks.slice(0, 5).map(
    disk => html`
  <div class="disk">
    <p class="name">${disk.device}</p>
    <p class="meta">${`${disk.mountpoint} (${disk.fstype})`}</p>
    ${gauge(disk.percent, `${formatBytes(disk.used)} / ${formatBytes(disk.total)}`)}
    <p class="meta">${`Free: ${formatBytes(disk.free)}`}</p>
  </div>`,
  )}`;

const networkBody = (d: NetworkStats): Html => html`
  ${d.interfaces.map(
    i => html`
  <div class="iface${i.isUp ? '' : ' down'}">
    <p class="name">${i.name}</p>
    <p class="meta">${i.ipAddresses.length > 0 ? i.ipAddresses.join(', ') : 'No IP'}</p>
    <p>${`↑ ${formatBandwidth(i.bytesSentPerSec)}  ↓ ${formatBandwidth(i.bytesRecvPerSec)}`}</p>
    <p class="meta">${`Total: ↑${formatBytes(i.bytesSent)} ↓${formatBytes(i.bytesRecv)}`}</p>
  </div>`,
  )}
  ${
    d.connections
      ? html`<div class="stats">
    ${stat('Total', String(d.connections.total))}
    ${stat('Established', String(d.connections.established))}
    ${stat('Listening', String(d.connections.listen))}
    ${stat('Time Wait', String(d.connections.timeWait))}
  </div>`
      : html`<p class="meta">Connection table not available</p>`
  }`;

const processTable = (id: string, rows: readonly ProcessEntry[]): Html => html`
  <table id="${id}">
    <thead><tr><th>PID</th><th>Name</th><th>CPU</th><th>Memory</th><th>User</th></tr></thead>
    <tbody>
      ${rows.map(
        p => html`<tr><td>${p.pid}</td><td>${p.name}</td><td>${formatPercent(p.cpuPercent)}</td><td>${`${p.memoryMb.toFixed(1)} MB`}</td><td>${p.username}</td></tr>`,
      )}
    </tbody>
  </table>`;

const processBody = (d: ProcessStats): Html => html`
  <div class="stats">
    ${stat('Total', String(d.total))}
    ${Object.entries(d.statusCounts)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([status, count]) => stat(status, String(count)))}
  </div>
  <h4>Top CPU</h4>
  ${processTable('cpu-processes', d.topCpu)}
  <h4>Top Memory</h4>
  ${processTable('memory-processes', d.topMemory)}`;

const gpuBody = (d: GpuStats): Html => html`
  ${d.devices.map(
    g => html`
  <div class="gpu">
    <p class="name">${g.name}</p>
    ${g.utilization === null ? '' : gauge(g.utilization)}
    ${
      g.memoryUsedMb !== null && g.memoryTotalMb !== null && g.memoryTotalMb > 0
        ? gauge((g.memoryUsedMb / g.memoryTotalMb) * 100, `${g.memoryUsedMb} MB / ${g.memoryTotalMb} MB`)
        : ''
    }
    <div class="stats">
      ${stat('Temperature', na(g.temperature, '°C'))}
      ${stat('Power', g.powerDraw === null ? 'N/A' : `${g.powerDraw.toFixed(1)}W / ${na(g.powerLimit, 'W')}`)}
      ${stat('Fan', na(g.fanSpeed, '%'))}
    </div>
  </div>`,
  )}
  ${
    d.processes && d.processes.length > 0
      ? html`<table class="gpu-processes">
    <thead><tr><th>PID</th><th>Name</th><th>Memory</th><th>GPU</th></tr></thead>
    <tbody>
      ${[...d.processes]
        .sort((a, b) => b.gpuMemoryMb - a.gpuMemoryMb)
        .slice(0, 10)
        .map(
          p => html`<tr><td>${p.pid}</td><td>${p.name}</td><td>${`${p.gpuMemoryMb} MB`}</td><td>${`GPU ${p.deviceId}`}</td></tr>`,
        )}
    </tbody>
  </table>`
      : ''
  }`;

const temperatureBody = (d: TemperatureStats): Html => html`
  <ul class="sensors">
    ${d.sensors.map(
      s => html`<li class="temp-${temperatureLevel(s.current, s.high ?? 85)}"><span>${s.label}</span><span>${`${s.current.toFixed(1)}°C`}</span></li>`,
    )}
  </ul>`;

const unavailableBody = (reason: string): Html =>
  html`<div class="not-available" role="status">Not available<span class="reason">${reason}</span></div>`;

/* -------------------------------------------------------------------------------------------------
 * Public API
 * ------------------------------------------------------------------------------------------------- */

export const renderSnapshot = (snapshot: AnySnapshot): Html => {
  if (snapshot.status === 'unavailable') {
    return card(snapshot.category, unavailableBody(snapshot.reason));
  }
  switch (snapshot.category) {
    case 'cpu':
      return card('cpu', cpuBody(snapshot.data), formatPercent(snapshot.data.percent));
    case 'memory':
      return card('memory', memoryBody(snapshot.data), formatPercent(snapshot.data.percent));
    case 'disk':
      return card('disk', diskBody(snapshot.data));
    case 'network':
      return card('network', networkBody(snapshot.data));
    case 'process':
      return card('process', processBody(snapshot.data));
    case 'gpu':
      return card('gpu', gpuBody(snapshot.data), snapshot.data.backend);
    case 'temperature':
      return card(
        'temperature',
        temperatureBody(snapshot.data),
        `${snapshot.data.max.toFixed(1)}°C`,
      );
  }
};

export const renderTimestamp = (epochMs: number): Html =>
  html`<span id="${TIMESTAMP_TARGET}">${formatClock(epochMs)}</span>`;

export const snapshotFragment = (snapshot: AnySnapshot): Fragment => ({
  target: fragmentTarget(snapshot.category),
  swap: 'outerHTML',
  html: renderSnapshot(snapshot).value,
});

export const timestampFragment = (epochMs: number): Fragment => ({
  target: TIMESTAMP_TARGET,
  swap: 'outerHTML',
  html: renderTimestamp(epochMs).value,
});
