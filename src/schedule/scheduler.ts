import fs from "node:fs";
import path from "node:path";
import { customAlphabet, nanoid } from "nanoid";
import { SubmissionFailedError } from "../errors.js";
import { cmdQuote } from "../utils/shell.js";
import type { JobPayload } from "./command.js";
import { execRunner, combinedOutput, type CommandRunner } from "./runner.js";
import { pad } from "./time.js";

export interface OSJobScheduler {
  readonly platform: "posix" | "windows";
  /** Hands the payload to the OS facility and returns its label for the new job. */
  submit(target: Date, payload: JobPayload): Promise<string>;
}

/** `YYYYMMDDHHMM`, the `at -t` time argument without seconds. */
export function formatAtTime(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}${pad(d.getHours())}${pad(d.getMinutes())}`;
}

export class PosixAtScheduler implements OSJobScheduler {
  readonly platform = "posix";

  constructor(private readonly run: CommandRunner = execRunner, private readonly bin = "at") {}

  async submit(target: Date, payload: JobPayload): Promise<string> {
    const scriptPath = path.join(payload.workDir, `.cueplay-job-${nanoid(10)}.sh`);
    fs.writeFileSync(scriptPath, payload.script, { encoding: "utf8", mode: 0o700 });
    try {
      const result = await this.run(this.bin, ["-t", formatAtTime(target), "-f", scriptPath], { cwd: payload.workDir });
      const output = combinedOutput(result);
      if (result.code !== 0) throw new SubmissionFailedError(output || `${this.bin} exited with status ${result.code}`);
      return output;
    } finally {
      fs.rmSync(scriptPath, { force: true });
    }
  }
}

/** Longest run command `schtasks /TR` accepts. */
export const MAX_TASK_RUN_LENGTH = 261;

const taskSuffix = customAlphabet("abcdefghijklmnopqrstuvwxyz0123456789", 6);

export function windowsTaskName(target: Date, suffix: string = taskSuffix()): string {
  const stamp = `${target.getFullYear()}${pad(target.getMonth() + 1)}${pad(target.getDate())}`;
  const clock = `${pad(target.getHours())}${pad(target.getMinutes())}${pad(target.getSeconds())}`;
  return `cueplay-${stamp}-${clock}-${suffix}`;
}

/** Single `cmd /c` line: change directory, wait out the seconds, run cueplay. */
export function windowsTaskCommand(payload: JobPayload): string {
  const steps = [`cd /d ${cmdQuote(payload.workDir)}`];
  if (payload.sleepSeconds > 0) steps.push(`timeout /t ${payload.sleepSeconds} /nobreak >nul`);
  steps.push(payload.command.map(cmdQuote).join(" "));
  return `cmd /c "${steps.join(" && ")}"`;
}

export class WindowsTaskScheduler implements OSJobScheduler {
  readonly platform = "windows";

  constructor(private readonly run: CommandRunner = execRunner, private readonly bin = "schtasks") {}

  async submit(target: Date, payload: JobPayload): Promise<string> {
    const name = windowsTaskName(target);
    const date = `${pad(target.getMonth() + 1)}/${pad(target.getDate())}/${target.getFullYear()}`;
    const time = `${pad(target.getHours())}:${pad(target.getMinutes())}`;
    const command = windowsTaskCommand(payload);
    if (command.length > MAX_TASK_RUN_LENGTH) {
      throw new SubmissionFailedError(
        `The task command is ${command.length} characters; Scheduled Tasks accepts at most ${MAX_TASK_RUN_LENGTH}. ` +
          "Use a shorter working directory, install path or media reference (a URI instead of a share link).",
      );
    }
    const args = ["/Create", "/SC", "ONCE", "/TN", name, "/TR", command, "/SD", date, "/ST", time, "/F"];
    const result = await this.run(this.bin, args);
    if (result.code !== 0) throw new SubmissionFailedError(combinedOutput(result) || `${this.bin} exited with status ${result.code}`);
    return name;
  }
}

export function createScheduler(platform: NodeJS.Platform = process.platform, run: CommandRunner = execRunner): OSJobScheduler {
  return platform === "win32" ? new WindowsTaskScheduler(run) : new PosixAtScheduler(run);
}
