import { formatMediaUri } from "../media/reference.js";
import type { Device } from "../media/service.js";
import type { JobRecord } from "../schedule/registry.js";
import { formatLocal } from "../schedule/time.js";

export interface FlashMessage {
  category: "error" | "success";
  text: string;
}

export interface PageModel {
  messages: FlashMessage[];
  devices: Device[];
  deviceError?: string;
  jobs: JobRecord[];
  jobsError?: string;
  volume: number | null;
}

const HTML_ESCAPES: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", "\"": "&quot;", "'": "&#39;" };

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const STYLE = `
  body { font-family: sans-serif; margin: 2rem; }
  form.schedule { display: grid; gap: 1rem; max-width: 32rem; }
  label { display: grid; gap: 0.5rem; }
  .messages { margin-bottom: 1rem; }
  .messages div { padding: 0.5rem 0.75rem; border-radius: 0.25rem; margin-bottom: 0.25rem; }
  .messages .error { background: #ffeaea; color: #521616; }
  .messages .success { background: #e7ffee; color: #13552c; }
  fieldset { border: 1px solid #ccc; padding: 1rem; border-radius: 0.5rem; }
  legend { font-weight: bold; }
  button { padding: 0.5rem 0.75rem; font-size: 1rem; }
  select, input { padding: 0.5rem; font-size: 1rem; }
  table { border-collapse: collapse; margin-top: 1rem; }
  th, td { border-bottom: 1px solid #ddd; padding: 0.4rem 0.75rem; text-align: left; }
  .muted { color: #777; }
  .device-warning { color: #a04900; }
`;

function renderMessages(model: PageModel): string {
  const items = model.messages.map((m) => `<div class="${m.category}">${escapeHtml(m.text)}</div>`);
  if (model.deviceError) items.push(`<div class="error">${escapeHtml(model.deviceError)}</div>`);
  return `<div class="messages">${items.join("")}</div>`;
}

function renderForm(model: PageModel): string {
  const options = model.devices
    .map((d) => `<option value="${escapeHtml(d.name)}">${escapeHtml(d.name)} (${escapeHtml(d.type)})</option>`)
    .join("");
  const volume = model.volume === null ? "" : ` value="${model.volume}"`;
  return `<form class="schedule" method="post" action="/schedule">
  <label>Spotify media (URI, link, or 22-char ID)<input name="media" type="text" required></label>
  <label>Device<select name="device"><option value="">Auto-select active/default</option>${options}</select></label>
  <label>Volume (0-100, optional)<input name="volume" type="number" min="0" max="100"${volume}></label>
  <fieldset>
    <legend>Schedule</legend>
    <label>ISO datetime (e.g. 2025-10-03T08:30)<input name="iso_at" type="text" placeholder="Optional"></label>
    <div>or</div>
    <label>Date (YYYY-MM-DD)<input name="date" type="date"></label>
    <label>Time (HH:MM or HH:MM:SS)<input name="time" type="time" step="1"></label>
  </fieldset>
  <button type="submit">Schedule Playback</button>
</form>`;
}

function renderJobs(model: PageModel): string {
  if (model.jobsError) return `<p class="device-warning">${escapeHtml(model.jobsError)}</p>`;
  if (!model.jobs.length) return `<p class="muted">No scheduled jobs.</p>`;
  const rows = model.jobs.map((job) => {
    const when = job.playbackAt ?? job.scheduledFor;
    const media = job.mediaDescription ?? (job.media ? formatMediaUri(job.media) : job.command ?? "");
    return `<tr>
  <td>${escapeHtml(job.id)}</td>
  <td>${when ? escapeHtml(formatLocal(when)) : `<span class="muted">unknown</span>`}</td>
  <td>${escapeHtml(media)}</td>
  <td>${escapeHtml(job.device ?? "")}</td>
  <td>${job.volume ?? ""}</td>
  <td><form method="post" action="/jobs/${encodeURIComponent(job.id)}/cancel"><button type="submit">Cancel</button></form></td>
</tr>`;
  });
  return `<table>
<thead><tr><th>Job</th><th>Plays at</th><th>Media</th><th>Device</th><th>Volume</th><th></th></tr></thead>
<tbody>${rows.join("")}</tbody>
</table>`;
}

function renderDevices(model: PageModel): string {
  if (!model.devices.length) return `<p class="device-warning">No devices reported. Launch Spotify to make one available.</p>`;
  const items = model.devices.map((d) => `<li>${escapeHtml(d.name)} (${escapeHtml(d.type)})${d.isActive ? " (active)" : ""}</li>`);
  return `<ul>${items.join("")}</ul>`;
}

export function renderPage(model: PageModel): string {
  return `<!doctype html>
<html>
<head><meta charset="utf-8"><title>Spotify Scheduler</title><style>${STYLE}</style></head>
<body>
<h1>Schedule Spotify Playback</h1>
${renderMessages(model)}
${renderForm(model)}
<section><h2>Scheduled Jobs</h2>${renderJobs(model)}</section>
<section><h2>Detected Devices</h2>${renderDevices(model)}</section>
</body>
</html>
`;
}
