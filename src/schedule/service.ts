import path from "node:path";
import type { Config } from "../config/schema.js";
import { ParseError } from "../errors.js";
import { parseMediaReference } from "../media/reference.js";
import { getWorkDir, selfCommand } from "../utils/helpers.js";
import { buildJobPayload, findActivateScript, type JobPayload, type ScheduleSpec } from "./command.js";
import { JobRegistry } from "./registry.js";
import { createScheduler, type OSJobScheduler } from "./scheduler.js";
import { resolveTarget } from "./time.js";
import type { CommandRunner } from "./runner.js";
import type { MediaService } from "../media/service.js";

export interface ScheduleInput {
  media: string;
  at?: string;
  time?: string;
  date?: string;
  device?: string;
  volume?: string | number;
}

export function parseVolumeOption(value: string | number | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const text = String(value).trim();
  const n = Number(text);
  if (!/^\d+$/.test(text) || n > 100) throw new ParseError("Volume must be an integer between 0 and 100.");
  return n;
}

/** Validates user input into a ScheduleSpec; media first, then time, then volume. */
export function buildScheduleSpec(input: ScheduleInput, now: Date = new Date()): ScheduleSpec {
  const mediaLiteral = input.media.trim();
  if (!mediaLiteral) throw new ParseError("Media is required.");
  const media = parseMediaReference(mediaLiteral);
  const target = resolveTarget({ at: input.at, time: input.time, date: input.date }, now);
  const device = input.device?.trim() || undefined;
  return { target, media, mediaLiteral, device, volume: parseVolumeOption(input.volume) };
}

export interface SystemJobDeps {
  scheduler: OSJobScheduler;
  program: string[];
  workDir: string;
  activateScript?: string;
}

export function systemJobDeps(config: Config, run?: CommandRunner): SystemJobDeps {
  const workDir = getWorkDir(config.scheduler.workDir);
  return {
    scheduler: createScheduler(process.platform, run),
    program: selfCommand(),
    workDir,
    activateScript: findActivateScript(workDir, config.scheduler.activateScript || undefined),
  };
}

export interface ScheduledJob {
  label: string;
  payload: JobPayload;
}

export async function scheduleSystemJob(spec: ScheduleSpec, deps: SystemJobDeps): Promise<ScheduledJob> {
  const payload = buildJobPayload(spec, { program: deps.program, workDir: deps.workDir, activateScript: deps.activateScript });
  const label = await deps.scheduler.submit(spec.target, payload);
  return { label, payload };
}

/** Registry that recognises jobs started through this program's entry script. */
export function createRegistry(media?: MediaService, run?: CommandRunner): JobRegistry {
  const program = selfCommand();
  return new JobRegistry({ run, media, programName: path.basename(program[program.length - 1]) });
}
