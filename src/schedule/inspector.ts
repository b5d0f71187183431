import path from "node:path";
import { CueplayError } from "../errors.js";
import { tryParseMediaReference, type MediaReference } from "../media/reference.js";
import { shellSplit } from "../utils/shell.js";
import { MARKER_PREFIX } from "./command.js";
import { execRunner, type CommandRunner } from "./runner.js";
import { parseDateTime } from "./time.js";

export interface JobMarker {
  media?: MediaReference;
  target?: Date;
  device?: string;
  volume?: number;
}

export interface JobInspection {
  command?: string;
  sleepSeconds?: number;
  marker?: JobMarker;
}

const ASSIGNMENT_RE = /^[A-Za-z_][A-Za-z0-9_]*=/;
const SLEEP_RE = /^sleep\s+(\d+)\s*$/;

/**
 * Lines `at` and our own payload put around the real command: comments,
 * environment exports, the `cd ... || {` guard block, heredoc wrappers.
 */
function isBoilerplate(line: string): boolean {
  if (!line) return true;
  if (line.startsWith("#")) return true;
  if (/^(export|umask|trap)(\s|$)/.test(line)) return true;
  if (/^(cd|sleep|source|\.)\s/.test(line)) return true;
  if (ASSIGNMENT_RE.test(line)) return true;
  if (line === "}" || /^exit(\s|$)/.test(line) || /^echo\s+'Execution directory inaccessible'/.test(line)) return true;
  return /^marcinDELIMITER[0-9a-f]*$/.test(line) || /^\$\{SHELL:-\/bin\/sh\}\s*<</.test(line);
}

export function parseJobMarker(line: string): JobMarker | undefined {
  if (!line.startsWith(`${MARKER_PREFIX} `)) return undefined;
  const marker: JobMarker = {};
  for (const field of line.slice(MARKER_PREFIX.length).trim().split(/\s+/)) {
    const eq = field.indexOf("=");
    if (eq <= 0) continue;
    const key = field.slice(0, eq);
    const value = field.slice(eq + 1);
    if (key === "media") marker.media = tryParseMediaReference(value);
    else if (key === "target") marker.target = safeDateTime(value);
    else if (key === "device") marker.device = safeDecode(value);
    else if (key === "volume") marker.volume = parseVolume(value);
  }
  return marker;
}

function safeDateTime(value: string): Date | undefined {
  try {
    return parseDateTime(value);
  } catch {
    return undefined;
  }
}

function safeDecode(value: string): string | undefined {
  try {
    return decodeURIComponent(value);
  } catch {
    return undefined;
  }
}

/** Pulls the sleep offset, the command line and the marker out of a job script. */
export function parseJobScript(text: string): JobInspection {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  const out: JobInspection = {};

  for (const line of lines) {
    const sleep = line.match(SLEEP_RE);
    if (sleep) {
      out.sleepSeconds = Number(sleep[1]);
      break;
    }
  }

  for (const line of lines) {
    const marker = parseJobMarker(line);
    if (marker) {
      out.marker = marker;
      break;
    }
  }

  for (let i = lines.length - 1; i >= 0; i--) {
    if (isBoilerplate(lines[i])) continue;
    out.command = lines[i];
    break;
  }
  return out;
}

export function parseVolume(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d{1,3}$/.test(value)) return undefined;
  const n = Number(value);
  return n <= 100 ? n : undefined;
}

function flagValue(tokens: string[], flag: string): string | undefined {
  const i = tokens.indexOf(flag);
  return i >= 0 && i + 1 < tokens.length ? tokens[i + 1] : undefined;
}

function isProgramToken(token: string, programName: string): boolean {
  const base = path.basename(token);
  const stem = base.replace(/\.[cm]?[jt]s$/, "");
  const want = path.basename(programName);
  return base === want || stem === want.replace(/\.[cm]?[jt]s$/, "");
}

/**
 * Finds the token naming cueplay's own entry script and parses the media
 * literal that follows it (after the `play` subcommand, if present).
 */
export function extractMedia(command: string, programName: string): MediaReference | undefined {
  const tokens = shellSplit(command);
  if (!tokens) return undefined;
  const at = tokens.findIndex((t) => isProgramToken(t, programName));
  if (at < 0) return undefined;
  let next = at + 1;
  if (tokens[next] === "play") next++;
  if (next >= tokens.length) return undefined;
  return tryParseMediaReference(tokens[next]);
}

export function extractVolume(command: string): number | undefined {
  const tokens = shellSplit(command);
  return tokens ? parseVolume(flagValue(tokens, "--volume")) : undefined;
}

export function extractDevice(command: string): string | undefined {
  const tokens = shellSplit(command);
  return tokens ? flagValue(tokens, "--device") : undefined;
}

export class OSJobInspector {
  constructor(private readonly run: CommandRunner = execRunner, private readonly bin = "at") {}

  /** Null when the facility cannot describe the job (tool missing, job gone). */
  async inspect(jobId: string): Promise<JobInspection | null> {
    try {
      const result = await this.run(this.bin, ["-c", jobId]);
      if (result.code !== 0 || !result.stdout.trim()) return null;
      return parseJobScript(result.stdout);
    } catch (err) {
      if (err instanceof CueplayError) return null;
      throw err;
    }
  }
}
