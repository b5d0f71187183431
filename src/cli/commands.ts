import { Command } from "commander";
import chalk from "chalk";
import { loadConfig, getConfigPath } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { CueplayError, errorMessage } from "../errors.js";
import { formatMediaUri, parseMediaReference } from "../media/reference.js";
import type { Device, MediaService } from "../media/service.js";
import { createSpotifyService } from "../media/spotify.js";
import { playNow, resolveDevice, waitUntil } from "../playback/executor.js";
import {
  buildScheduleSpec,
  createRegistry,
  parseVolumeOption,
  scheduleSystemJob,
  systemJobDeps,
  type ScheduledJob,
} from "../schedule/service.js";
import { formatDuration, formatLocal } from "../schedule/time.js";
import type { ScheduleSpec } from "../schedule/command.js";
import type { JobRecord } from "../schedule/registry.js";
import { startWebServer } from "../web/server.js";

export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

interface PlayOptions {
  at?: string;
  time?: string;
  date?: string;
  device?: string;
  volume?: string;
  now?: boolean;
  systemJob?: boolean;
  browser: boolean;
  listDevices?: boolean;
}

function usageError(cmd: Command, err: unknown): never {
  const code = err instanceof CueplayError ? err.code.toLowerCase() : "cueplay.error";
  cmd.error(chalk.red(`error: ${errorMessage(err)}`), { exitCode: EXIT_USAGE, code });
}

export function formatDevice(device: Device): string {
  const bits = [device.isActive ? "active" : "", device.isPrivateSession ? "private" : ""].filter(Boolean);
  const status = bits.length ? ` (${bits.join(", ")})` : "";
  return `- ${device.name.padEnd(20)} ${`[${device.type}]`.padEnd(12)} id=${device.id || "<no-id>"}${status}`;
}

export function printDevices(devices: Device[]): void {
  if (!devices.length) {
    console.log(chalk.yellow("No available Spotify devices. Launch Spotify somewhere and try again."));
    return;
  }
  console.log("Available Spotify devices:");
  for (const device of devices) console.log(formatDevice(device));
}

export function formatJob(job: JobRecord): string {
  const when = job.playbackAt ?? job.scheduledFor;
  const media = job.mediaDescription ?? (job.media ? formatMediaUri(job.media) : job.command ?? "(unknown command)");
  const extras = [
    job.device ? `device=${job.device}` : "",
    job.volume !== undefined ? `volume=${job.volume}` : "",
    job.user ? `user=${job.user}` : "",
  ].filter(Boolean);
  return `${chalk.bold(job.id.padStart(4))}  ${when ? formatLocal(when) : "(unknown time)".padEnd(19)}  ${media}${extras.length ? chalk.gray(`  ${extras.join(" ")}`) : ""}`;
}

/** Seams the commands reach the outside world through. */
export interface CliDeps {
  loadConfig: () => Config;
  mediaService: (config: Config, interactive: boolean) => MediaService;
  submitJob: (spec: ScheduleSpec, config: Config) => Promise<ScheduledJob>;
  now: () => Date;
  wait: (target: Date) => Promise<void>;
  /** Installs a Ctrl-C handler and returns its removal. */
  onInterrupt: (handler: () => void) => () => void;
}

const defaultDeps: CliDeps = {
  loadConfig: () => loadConfig(),
  mediaService: (config, interactive) => createSpotifyService(config.spotify, interactive),
  submitJob: (spec, config) => scheduleSystemJob(spec, systemJobDeps(config)),
  now: () => new Date(),
  wait: (target) => waitUntil(target),
  onInterrupt: (handler) => {
    process.once("SIGINT", handler);
    return () => process.removeListener("SIGINT", handler);
  },
};

async function runPlay(deps: CliDeps, cmd: Command, mediaArg: string | undefined, opts: PlayOptions): Promise<void> {
  const config = deps.loadConfig();

  if (opts.listDevices) {
    try {
      printDevices(await deps.mediaService(config, opts.browser).listDevices());
    } catch (err) {
      usageError(cmd, `Unable to load Spotify devices: ${errorMessage(err)}`);
    }
    return;
  }

  if (!mediaArg) usageError(cmd, "Media argument is required unless --list-devices is used.");

  if (opts.now) {
    try {
      const volume = parseVolumeOption(opts.volume);
      const media = parseMediaReference(mediaArg);
      const device = await playNow(deps.mediaService(config, opts.browser), { media, device: opts.device, volume });
      console.log(chalk.green(`Playback started on ${device.name}. Enjoy!`));
    } catch (err) {
      usageError(cmd, err);
    }
    return;
  }

  let spec: ScheduleSpec;
  try {
    spec = buildScheduleSpec(
      { media: mediaArg, at: opts.at, time: opts.time, date: opts.date, device: opts.device, volume: opts.volume },
      deps.now(),
    );
  } catch (err) {
    usageError(cmd, err);
  }
  console.log(`Scheduling playback for ${formatLocal(spec.target)}.`);

  if (opts.systemJob) {
    try {
      const job = await deps.submitJob(spec, config);
      console.log(chalk.green(`Created ${job.label} for ${formatLocal(spec.target)}.`));
    } catch (err) {
      usageError(cmd, err);
    }
    return;
  }

  const service = deps.mediaService(config, opts.browser);
  let device: Device;
  try {
    device = await resolveDevice(service, spec.device);
  } catch (err) {
    usageError(cmd, err);
  }

  const removeInterrupt = deps.onInterrupt(() => {
    console.log("\nAborted by user.");
    process.exit(EXIT_INTERRUPTED);
  });
  try {
    const remaining = spec.target.getTime() - deps.now().getTime();
    if (remaining > 1000) {
      console.log(`Waiting for ~${formatDuration(remaining)} (hh:mm:ss) before starting playback...`);
      await deps.wait(spec.target);
    }
  } finally {
    removeInterrupt();
  }

  try {
    await playNow(service, { media: spec.media, volume: spec.volume }, device);
  } catch (err) {
    usageError(cmd, `Spotify refused to start playback: ${errorMessage(err)}`);
  }
  console.log(chalk.green("Playback started. Enjoy!"));
}

export function buildProgram(overrides: Partial<CliDeps> = {}): Command {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const program = new Command();
  program
    .name("cueplay")
    .description("Schedule Spotify playback on a Connect device at a future time")
    .version("0.1.0", "-v, --version", "show version");

  program
    .command("play")
    .description("Play media now, wait in-process until a time, or hand the job to at / Scheduled Tasks")
    .argument("[media]", "Spotify URI, share link, or 22-character track ID")
    .option("--at <datetime>", "Absolute timestamp (ISO 8601), e.g. 2025-10-03T08:30")
    .option("--time <clock>", "Clock time (HH:MM or HH:MM:SS); without --date the next occurrence")
    .option("--date <date>", "Date (YYYY-MM-DD) to combine with --time; must not be in the past")
    .option("--device <name>", "Spotify Connect device name (defaults to the active device)")
    .option("--volume <percent>", "Set the device volume (0-100) before playback")
    .option("--now", "Start playback immediately")
    .option("--system-job", "Create an at / Scheduled Tasks job and exit")
    .option("--no-browser", "Never start the interactive Spotify sign-in")
    .option("--list-devices", "List available Spotify Connect devices and exit")
    .action(async (media: string | undefined, opts: PlayOptions, cmd: Command) => {
      await runPlay(deps, cmd, media, opts);
    });

  program
    .command("devices")
    .description("List available Spotify Connect devices")
    .option("--no-browser", "Never start the interactive Spotify sign-in")
    .action(async (opts: { browser: boolean }, cmd: Command) => {
      try {
        printDevices(await deps.mediaService(deps.loadConfig(), opts.browser).listDevices());
      } catch (err) {
        usageError(cmd, err);
      }
    });

  program
    .command("jobs")
    .description("List pending scheduled playback jobs")
    .option("--no-describe", "Do not look up media names")
    .action(async (opts: { describe: boolean }) => {
      const config = deps.loadConfig();
      const registry = createRegistry(opts.describe ? deps.mediaService(config, false) : undefined);
      const { jobs, error } = await registry.list();
      if (error) console.log(chalk.yellow(error));
      if (!jobs.length) {
        if (!error) console.log("No scheduled jobs.");
        return;
      }
      for (const job of jobs) console.log(formatJob(job));
    });

  program
    .command("cancel")
    .description("Remove a pending job by id")
    .argument("<id>", "Job id as shown by `cueplay jobs`")
    .action(async (id: string, _opts: unknown, cmd: Command) => {
      const result = await createRegistry().remove(id);
      if (!result.ok) usageError(cmd, result.message);
      console.log(chalk.green(result.message));
    });

  program
    .command("web")
    .description("Start the scheduling web form")
    .option("-p, --port <port>", "Port to listen on")
    .option("--host <host>", "Interface to bind")
    .action(async (opts: { port?: string; host?: string }) => {
      const config = deps.loadConfig();
      const port = opts.port ? Number(opts.port) : config.web.port;
      const host = opts.host ?? config.web.host;
      const server = await startWebServer({ config, port, host });
      console.log(chalk.cyan(`cueplay web form listening on http://${host}:${server.port}`));
      const stop = () => {
        server.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error(chalk.red(`Failed to stop the web server: ${errorMessage(err)}`));
            process.exit(1);
          },
        );
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
    });

  program
    .command("config")
    .description("Show the config file path and effective settings")
    .action(() => {
      const config = deps.loadConfig();
      const masked = { ...config, spotify: { ...config.spotify, clientSecret: config.spotify.clientSecret ? "********" : "" } };
      console.log(chalk.gray(getConfigPath()));
      console.log(JSON.stringify(masked, null, 2));
    });

  return program;
}
