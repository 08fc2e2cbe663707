// src/views/page.ts
import type { IntervalView } from 'App/services/RefreshPolicy';
import { CATEGORY_ORDER, SnapshotSet, StaticSystemInfo } from 'App/types/metrics';
import { formatUptime } from 'App/utils/format';
import { CATEGORY_TITLES, renderSnapshot, renderTimestamp } from './fragments';
import { Html, html, raw } from './html';

export interface PageModel {
  snapshots: SnapshotSet;
  system: StaticSystemInfo;
  intervals: IntervalView[];
  renderedAt: number;
}

const STYLES = `
  :root { --ok: #2e9d5b; --warn: #d39b1f; --crit: #c9392f; --bg: #14161a; --card: #1d2026; --fg: #e4e6eb; --muted: #8b909a; }
  * { box-sizing: border-box; }
  body { margin: 0; font: 14px/1.4 system-ui, sans-serif; background: var(--bg); color: var(--fg); }
  header.top { display: flex; justify-content: space-between; align-items: center; padding: 12px 20px; border-bottom: 1px solid #2a2e36; }
  header.top h1 { font-size: 18px; margin: 0; }
  .status { color: var(--muted); }
  .status.offline { color: var(--crit); }
  main { display: grid; grid-template-columns: repeat(auto-fill, minmax(340px, 1fr)); gap: 16px; padding: 20px; }
  .card { background: var(--card); border-radius: 8px; padding: 14px; }
  .card header { display: flex; justify-content: space-between; align-items: baseline; }
  .card h3 { margin: 0 0 8px; font-size: 15px; }
  .badge { font-weight: 600; }
  .gauge { position: relative; height: 18px; background: #2a2e36; border-radius: 4px; overflow: hidden; margin: 4px 0; }
  .gauge-bar { height: 100%; }
  .gauge-ok .gauge-bar { background: var(--ok); }
  .gauge-warn .gauge-bar { background: var(--warn); }
  .gauge-crit .gauge-bar { background: var(--crit); }
  .gauge-label { position: absolute; inset: 0; text-align: center; font-size: 12px; }
  .stats { display: flex; flex-wrap: wrap; gap: 12px; margin: 8px 0; }
  .stat-title, .meta { color: var(--muted); font-size: 12px; }
  .name { font-weight: 600; margin: 6px 0 0; }
  .iface.down { opacity: 0.5; }
  table { width: 100%; border-collapse: collapse; font-size: 12px; }
  th, td { text-align: left; padding: 2px 4px; }
  .sensors { list-style: none; padding: 0; margin: 0; }
  .sensors li { display: flex; justify-content: space-between; }
  .temp-warn { color: var(--warn); }
  .temp-crit { color: var(--crit); }
  .not-available { color: var(--muted); font-style: italic; }
  .not-available .reason { display: block; font-size: 12px; }
  .settings { padding: 0 20px 20px; }
  .settings form { display: flex; flex-wrap: wrap; gap: 12px; align-items: end; }
  .settings label { display: flex; flex-direction: column; font-size: 12px; color: var(--muted); }
  .settings input { width: 80px; }
`;

/**
 * Client side of the live stream: replaces each fragment's target element,
 * stops for good on `shutdown`, and posts the settings form as JSON.
 */
const CLIENT_SCRIPT = `
(function () {
  var status = document.getElementById('connection-status');
  var source = new EventSource('/stream_updates');
  function setStatus(text, offline) {
    status.textContent = text;
    status.className = offline ? 'status offline' : 'status';
  }
  source.addEventListener('open', function () { setStatus('Live', false); });
  source.addEventListener('error', function () {
    if (source.readyState !== EventSource.CLOSED) setStatus('Reconnecting...', true);
  });
  source.addEventListener('update', function (event) {
    var message = JSON.parse(event.data);
    message.fragments.forEach(function (fragment) {
      var target = document.getElementById(fragment.target);
      if (target) target.outerHTML = fragment.html;
    });
  });
  source.addEventListener('shutdown', function (event) {
    source.close();
    setStatus(JSON.parse(event.data).reason, true);
  });

  var form = document.getElementById('settings-form');
  form.addEventListener('submit', function (event) {
    event.preventDefault();
    var body = {};
    new FormData(form).forEach(function (value, key) { body[key] = Number(value); });
    fetch('/update_intervals', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    }).then(function (res) {
      document.getElementById('settings-result').textContent = res.ok ? 'Saved' : 'Rejected (' + res.status + ')';
    });
  });
})();
`;

const systemSummary = (s: StaticSystemInfo, now: number): Html => html`
  <p class="meta">${`${s.hostname} · ${s.os} ${s.osRelease} (${s.architecture}) · ${s.processor} · ${s.cpuCount ?? '?'}/${s.cpuCountLogical} cores · up ${formatUptime(new Date(s.bootTime), new Date(now))}`}</p>`;

const settingsForm = (intervals: IntervalView[]): Html => html`
  <section class="settings">
    <h2>Refresh intervals (seconds)</h2>
    <form id="settings-form" method="post" action="/update_intervals">
      ${intervals.map(
        i => html`<label>${CATEGORY_TITLES[i.category]}<input type="number" name="${i.category}" value="${i.seconds}" min="${i.bounds.min}" max="${i.bounds.max}" step="1" required></label>`,
      )}
      <button type="submit">Apply</button>
      <span id="settings-result" class="meta"></span>
    </form>
  </section>`;

export const renderPage = ({ snapshots, system, intervals, renderedAt }: PageModel): string =>
  html`<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${`${system.hostname} · System Monitor`}</title>
  <style>${raw(STYLES)}</style>
</head>
<body>
  <header class="top">
    <div>
      <h1>System Monitor</h1>
      ${systemSummary(system, renderedAt)}
    </div>
    <div>
      <span id="connection-status" class="status">Connecting...</span>
      · updated ${renderTimestamp(renderedAt)}
    </div>
  </header>
  <main>
    ${CATEGORY_ORDER.map(category => renderSnapshot(snapshots[category]))}
  </main>
  ${settingsForm(intervals)}
  <script>${raw(CLIENT_SCRIPT)}</script>
</body>
</html>`.value;
