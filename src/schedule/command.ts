import fs from "node:fs";
import path from "node:path";
import { formatMediaUri, type MediaReference } from "../media/reference.js";
import { formatLocalIso } from "./time.js";
import { shellJoin, shellQuote } from "../utils/shell.js";
import { expandHome } from "../utils/helpers.js";

export interface ScheduleSpec {
  target: Date;
  media: MediaReference;
  /** The media reference exactly as the user gave it. */
  mediaLiteral: string;
  device?: string;
  volume?: number;
}

export interface JobPayload {
  command: string[];
  commandLine: string;
  script: string;
  sleepSeconds: number;
  workDir: string;
}

export interface BuildOptions {
  /** Runtime, loader flags and entry script that start cueplay. */
  program: string[];
  workDir: string;
  activateScript?: string;
}

export const MARKER_PREFIX = "# cueplay-job";
export const RUN_NOW_FLAG = "--now";
export const NO_BROWSER_FLAG = "--no-browser";

const ACTIVATE_CANDIDATES = [".envrc", ".env.sh"];

/** First existing activation script: the configured one, else `.envrc` or `.env.sh` in the work dir. */
export function findActivateScript(workDir: string, configured?: string): string | undefined {
  const candidates = [
    ...(configured ? [path.resolve(workDir, expandHome(configured))] : []),
    ...ACTIVATE_CANDIDATES.map((name) => path.join(workDir, name)),
  ];
  return candidates.find((p) => fs.existsSync(p) && fs.statSync(p).isFile());
}

export function buildCommand(spec: ScheduleSpec, program: readonly string[]): string[] {
  const command = [...program, "play", spec.mediaLiteral.trim(), RUN_NOW_FLAG];
  if (spec.device) command.push("--device", spec.device);
  if (spec.volume !== undefined) command.push("--volume", String(spec.volume));
  command.push(NO_BROWSER_FLAG);
  return command;
}

/** Machine-readable summary the shell ignores and the inspector reads back. */
export function buildMarker(spec: ScheduleSpec): string {
  const fields = [`media=${formatMediaUri(spec.media)}`, `target=${formatLocalIso(spec.target)}`];
  if (spec.device) fields.push(`device=${encodeURIComponent(spec.device)}`);
  if (spec.volume !== undefined) fields.push(`volume=${spec.volume}`);
  return `${MARKER_PREFIX} ${fields.join(" ")}`;
}

export function buildJobPayload(spec: ScheduleSpec, options: BuildOptions): JobPayload {
  const command = buildCommand(spec, options.program);
  const commandLine = shellJoin(command);
  const sleepSeconds = spec.target.getSeconds();
  const lines = [
    "#!/bin/sh",
    buildMarker(spec),
    `cd ${shellQuote(options.workDir)}`,
    `sleep ${sleepSeconds}`,
  ];
  if (options.activateScript) lines.push(`. ${shellQuote(options.activateScript)}`);
  lines.push(commandLine);
  return { command, commandLine, script: `${lines.join("\n")}\n`, sleepSeconds, workDir: options.workDir };
}
