import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import chalk from "chalk";
import type { Config } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import type { Device, MediaService } from "../media/service.js";
import { createSpotifyService } from "../media/spotify.js";
import type { ScheduleSpec } from "../schedule/command.js";
import type { JobRecord, JobRegistry } from "../schedule/registry.js";
import { buildScheduleSpec, createRegistry, scheduleSystemJob, systemJobDeps, type ScheduledJob } from "../schedule/service.js";
import { formatLocal, formatLocalIso } from "../schedule/time.js";
import { renderPage, type FlashMessage } from "./page.js";

type Form = Record<string, string>;

export interface WebServerOptions {
  config: Config;
  port?: number;
  host?: string;
  media?: MediaService;
  registry?: JobRegistry;
  scheduleJob?: (spec: ScheduleSpec) => Promise<ScheduledJob>;
  now?: () => Date;
  /** Request log lines; defaults to console.log. */
  log?: (line: string) => void;
}

export interface WebServerHandle {
  port: number;
  close: () => Promise<void>;
}

const MAX_BODY = 64 * 1024;

/** Parsed form or JSON body; null when it exceeds MAX_BODY or the client goes away. */
function readBody(req: IncomingMessage): Promise<Form | null> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflow = false;
    req.on("data", (c: Buffer) => {
      size += c.length;
      if (size > MAX_BODY) overflow = true;
      if (!overflow) chunks.push(c);
    });
    req.on("end", () => {
      if (overflow) return resolve(null);
      const buf = Buffer.concat(chunks).toString("utf8");
      const type = req.headers["content-type"] ?? "";
      if (type.includes("application/json")) {
        try {
          const parsed: unknown = buf ? JSON.parse(buf) : {};
          const form: Form = {};
          if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
            for (const [k, v] of Object.entries(parsed)) if (typeof v === "string" || typeof v === "number") form[k] = String(v);
          }
          resolve(form);
        } catch {
          resolve({});
        }
        return;
      }
      resolve(Object.fromEntries(new URLSearchParams(buf)));
    });
    req.on("error", () => resolve(null));
    req.on("close", () => resolve(null));
  });
}

function sendJson(res: ServerResponse, status: number, data: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(data));
}

function sendHtml(res: ServerResponse, html: string): void {
  res.statusCode = 200;
  res.setHeader("Content-Type", "text/html; charset=utf-8");
  res.end(html);
}

function redirect(res: ServerResponse, message: FlashMessage): void {
  const key = message.category === "success" ? "ok" : "error";
  res.statusCode = 303;
  res.setHeader("Location", `/?${key}=${encodeURIComponent(message.text)}`);
  res.end();
}

function jobJson(job: JobRecord): Record<string, unknown> {
  return {
    ...job,
    scheduledFor: job.scheduledFor ? formatLocalIso(job.scheduledFor) : null,
    playbackAt: job.playbackAt ? formatLocalIso(job.playbackAt) : null,
  };
}

export function startWebServer(input: WebServerOptions): Promise<WebServerHandle> {
  const media = input.media ?? createSpotifyService(input.config.spotify, false);
  const registry = input.registry ?? createRegistry(media);
  const scheduleJob = input.scheduleJob ?? ((spec: ScheduleSpec) => scheduleSystemJob(spec, systemJobDeps(input.config)));
  const now = input.now ?? (() => new Date());
  const log = input.log ?? ((line: string) => console.log(line));

  const methodColors: Record<string, (s: string) => string> = {
    GET: chalk.green,
    POST: chalk.blue,
    DELETE: chalk.red,
  };

  async function loadDevices(): Promise<{ devices: Device[]; error?: string }> {
    try {
      const devices = await media.listDevices();
      return { devices: [...devices].sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase())) };
    } catch (err) {
      return { devices: [], error: `Unable to load Spotify devices: ${errorMessage(err)}` };
    }
  }

  async function currentVolume(): Promise<number | null> {
    try {
      return await media.currentVolumePercent();
    } catch {
      return null;
    }
  }

  async function index(url: URL, res: ServerResponse): Promise<void> {
    const messages: FlashMessage[] = [];
    const ok = url.searchParams.get("ok");
    const error = url.searchParams.get("error");
    if (ok) messages.push({ category: "success", text: ok });
    if (error) messages.push({ category: "error", text: error });
    const [{ devices, error: deviceError }, listing, volume] = await Promise.all([loadDevices(), registry.list(), currentVolume()]);
    sendHtml(res, renderPage({ messages, devices, deviceError, jobs: listing.jobs, jobsError: listing.error, volume }));
  }

  async function schedule(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const form = await readBody(req);
    if (!form) return sendJson(res, 413, { error: "Request body too large." });
    const at = form.iso_at?.trim() || undefined;
    const time = form.time?.trim() || undefined;
    if (!form.media?.trim()) return redirect(res, { category: "error", text: "Media is required." });
    if (!at && !time) return redirect(res, { category: "error", text: "Provide either an ISO timestamp or a time (with an optional date)." });

    let spec: ScheduleSpec;
    try {
      spec = buildScheduleSpec({ media: form.media, at, time, date: form.date, device: form.device, volume: form.volume }, now());
    } catch (err) {
      return redirect(res, { category: "error", text: errorMessage(err) });
    }
    try {
      const job = await scheduleJob(spec);
      redirect(res, { category: "success", text: `Created ${job.label} for ${formatLocal(spec.target)}.` });
    } catch (err) {
      redirect(res, { category: "error", text: errorMessage(err) });
    }
  }

  const server = createServer(async (req, res) => {
    const method = req.method || "GET";
    const url = new URL(req.url || "/", `http://${req.headers.host || "localhost"}`);
    const pathname = url.pathname;
    const color = methodColors[method] ?? ((s: string) => s);
    log(`[web] ${color(method)} ${pathname}`);

    try {
      if (method === "GET" && pathname === "/") return await index(url, res);
      if (method === "POST" && pathname === "/schedule") return await schedule(req, res);

      const cancelMatch = pathname.match(/^\/jobs\/([^/]+)\/cancel$/);
      if (cancelMatch && method === "POST") {
        const result = await registry.remove(decodeURIComponent(cancelMatch[1]));
        return redirect(res, { category: result.ok ? "success" : "error", text: result.message });
      }

      if (method === "GET" && pathname === "/api/jobs") {
        const listing = await registry.list();
        return sendJson(res, 200, { jobs: listing.jobs.map(jobJson), error: listing.error ?? null });
      }

      const apiJobMatch = pathname.match(/^\/api\/jobs\/([^/]+)$/);
      if (apiJobMatch && method === "DELETE") {
        const result = await registry.remove(decodeURIComponent(apiJobMatch[1]));
        return sendJson(res, result.ok ? 200 : 400, result);
      }

      if (method === "GET" && pathname === "/api/devices") {
        const { devices, error } = await loadDevices();
        return error ? sendJson(res, 502, { error }) : sendJson(res, 200, { devices });
      }

      sendJson(res, 404, { error: "not found" });
    } catch (err) {
      log(chalk.red(`[web] ${method} ${pathname} failed: ${errorMessage(err)}`));
      if (!res.headersSent) sendJson(res, 500, { error: errorMessage(err) });
      else res.end();
    }
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(input.port ?? input.config.web.port, input.host ?? input.config.web.host, () => {
      const address = server.address();
      const port = address && typeof address === "object" ? address.port : input.port ?? 0;
      resolve({
        port,
        close: () => new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done()))),
      });
    });
  });
}
