import chalk from "chalk";
import { CueplayError, ToolMissingError, errorMessage } from "../errors.js";
import { formatMediaUri, type MediaReference } from "../media/reference.js";
import type { MediaService } from "../media/service.js";
import { describeMedia } from "../media/service.js";
import { extractDevice, extractMedia, extractVolume, OSJobInspector } from "./inspector.js";
import { combinedOutput, execRunner, type CommandRunner } from "./runner.js";

export interface JobRecord {
  id: string;
  scheduledFor?: Date;
  playbackAt?: Date;
  command?: string;
  media?: MediaReference;
  mediaDescription?: string;
  volume?: number;
  device?: string;
  queue?: string;
  user?: string;
}

export interface JobListing {
  jobs: JobRecord[];
  error?: string;
}

export interface RemoveResult {
  ok: boolean;
  message: string;
}

export interface JobRegistryOptions {
  run?: CommandRunner;
  platform?: NodeJS.Platform;
  /** Entry script name used to spot cueplay in a job's command line. */
  programName: string;
  /** Optional lookup for human-readable media descriptions. */
  media?: MediaService;
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

/** Parses atq's `Weekday Mon DD HH:MM:SS YYYY` (local time). */
export function parseAtqTimestamp(tokens: string[]): Date | undefined {
  if (tokens.length < 5) return undefined;
  const [weekday, mon, dd, clock, yyyy] = tokens;
  const month = MONTHS.indexOf(mon);
  const hms = clock.match(/^(\d{1,2}):(\d{2}):(\d{2})$/);
  if (!WEEKDAYS.includes(weekday) || month < 0 || !hms || !/^\d{1,2}$/.test(dd) || !/^\d{4}$/.test(yyyy)) return undefined;
  const d = new Date(Number(yyyy), month, Number(dd), Number(hms[1]), Number(hms[2]), Number(hms[3]));
  return d.getMonth() === month && d.getDate() === Number(dd) ? d : undefined;
}

export interface AtqLine {
  id: string;
  scheduledFor?: Date;
  queue?: string;
  user?: string;
}

export function parseAtqLine(line: string): AtqLine | null {
  const text = line.trim();
  if (!text) return null;
  const tab = text.indexOf("\t");
  const split = tab >= 0 ? tab : text.search(/\s/);
  const id = split >= 0 ? text.slice(0, split) : text;
  const details = split >= 0 ? text.slice(split + 1).trim() : "";
  const tokens = details ? details.split(/\s+/) : [];
  return { id, scheduledFor: parseAtqTimestamp(tokens.slice(0, 5)), queue: tokens[5], user: tokens[6] };
}

function byScheduledTime(a: JobRecord, b: JobRecord): number {
  const ta = a.scheduledFor?.getTime() ?? Number.MAX_SAFE_INTEGER;
  const tb = b.scheduledFor?.getTime() ?? Number.MAX_SAFE_INTEGER;
  if (ta !== tb) return ta - tb;
  return a.id.localeCompare(b.id, undefined, { numeric: true });
}

/** Pending `at` jobs, read back from atq and `at -c`. */
export class JobRegistry {
  private readonly run: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly inspector: OSJobInspector;

  constructor(private readonly options: JobRegistryOptions) {
    this.run = options.run ?? execRunner;
    this.platform = options.platform ?? process.platform;
    this.inspector = new OSJobInspector(this.run);
  }

  get supported(): boolean {
    return this.platform !== "win32";
  }

  async list(): Promise<JobListing> {
    if (!this.supported) return { jobs: [], error: "Listing scheduled jobs is only supported with the POSIX 'at' facility." };

    let output: string;
    try {
      const result = await this.run("atq", []);
      if (result.code !== 0) return { jobs: [], error: combinedOutput(result) || `atq exited with status ${result.code}` };
      output = result.stdout;
    } catch (err) {
      if (err instanceof ToolMissingError) return { jobs: [], error: "The 'atq' command is not available. Install the 'at' package to list jobs." };
      return { jobs: [], error: `Unable to list jobs: ${errorMessage(err)}` };
    }

    const jobs: JobRecord[] = [];
    for (const line of output.split(/\r?\n/)) {
      const entry = parseAtqLine(line);
      if (entry) jobs.push(await this.describe(entry));
    }
    return { jobs: jobs.sort(byScheduledTime) };
  }

  private async describe(entry: AtqLine): Promise<JobRecord> {
    const record: JobRecord = { ...entry };
    const inspection = await this.inspector.inspect(entry.id);
    if (inspection) {
      record.command = inspection.command;
      if (record.scheduledFor && inspection.sleepSeconds !== undefined) {
        record.playbackAt = new Date(record.scheduledFor.getTime() + inspection.sleepSeconds * 1000);
      } else if (inspection.marker?.target) {
        record.playbackAt = inspection.marker.target;
      }
      const marker = inspection.marker;
      const command = inspection.command;
      record.media = marker?.media ?? (command ? extractMedia(command, this.options.programName) : undefined);
      record.volume = marker ? marker.volume : command ? extractVolume(command) : undefined;
      record.device = marker ? marker.device : command ? extractDevice(command) : undefined;
    }
    if (record.media && this.options.media) {
      try {
        record.mediaDescription = await describeMedia(this.options.media, record.media);
      } catch (err) {
        // fall back to the raw reference for this job only
        console.warn(chalk.yellow(`Could not describe ${formatMediaUri(record.media)}: ${errorMessage(err)}`));
      }
    }
    return record;
  }

  async remove(jobId: string): Promise<RemoveResult> {
    const id = jobId.trim();
    if (!id) return { ok: false, message: "Job id is required." };
    if (!/^\d+$/.test(id)) return { ok: false, message: `Invalid job id '${id}'. Job ids are numeric.` };
    if (!this.supported) return { ok: false, message: "Removing scheduled jobs is only supported with the POSIX 'at' facility." };

    try {
      const result = await this.run("atrm", [id]);
      if (result.code === 0) return { ok: true, message: `Removed job ${id}.` };
      return { ok: false, message: combinedOutput(result) || `atrm exited with status ${result.code}` };
    } catch (err) {
      if (err instanceof ToolMissingError) return { ok: false, message: "The 'atrm' command is not available." };
      if (err instanceof CueplayError) return { ok: false, message: err.message };
      throw err;
    }
  }
}
