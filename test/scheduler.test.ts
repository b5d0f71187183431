import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { buildJobPayload } from "../src/schedule/command.js";
import { parseMediaReference } from "../src/media/reference.js";
import type { CommandRunner, RunResult } from "../src/schedule/runner.js";
import {
  createScheduler,
  formatAtTime,
  MAX_TASK_RUN_LENGTH,
  PosixAtScheduler,
  WindowsTaskScheduler,
  windowsTaskCommand,
  windowsTaskName,
} from "../src/schedule/scheduler.js";
import { SubmissionFailedError, ToolMissingError } from "../src/errors.js";

const ID = "4uLU6hMCjMI75M1A2tKUQC";
const target = new Date(2025, 9, 4, 8, 30, 17);

interface Call {
  file: string;
  args: readonly string[];
  scriptExisted?: boolean;
  script?: string;
}

function fakeRunner(result: RunResult | Error, calls: Call[]): CommandRunner {
  return async (file, args) => {
    const call: Call = { file, args };
    const f = args.indexOf("-f");
    if (f >= 0) {
      call.scriptExisted = fs.existsSync(args[f + 1]);
      call.script = call.scriptExisted ? fs.readFileSync(args[f + 1], "utf8") : undefined;
    }
    calls.push(call);
    if (result instanceof Error) throw result;
    return result;
  };
}

function payloadIn(workDir: string) {
  return buildJobPayload(
    { target, media: parseMediaReference(ID), mediaLiteral: ID, device: "Living Room" },
    { program: ["/usr/bin/node", "/opt/cueplay/dist/index.js"], workDir },
  );
}

function scriptsLeft(dir: string): string[] {
  return fs.readdirSync(dir).filter((f) => f.startsWith(".cueplay-job-"));
}

describe("posix at scheduler", () => {
  test("formats the -t argument to the minute", () => {
    expect(formatAtTime(target)).toBe("202510040830");
  });

  test("submits the script file and returns the facility output as label", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cueplay-at-"));
    const calls: Call[] = [];
    const run = fakeRunner({ code: 0, stdout: "", stderr: "warning: commands will be executed using /bin/sh\njob 7 at Sat Oct  4 08:30:00 2025\n" }, calls);
    const payload = payloadIn(dir);

    const label = await new PosixAtScheduler(run).submit(target, payload);

    expect(label).toBe("warning: commands will be executed using /bin/sh\njob 7 at Sat Oct  4 08:30:00 2025");
    expect(calls).toHaveLength(1);
    expect(calls[0].file).toBe("at");
    expect(calls[0].args.slice(0, 3)).toEqual(["-t", "202510040830", "-f"]);
    expect(path.dirname(String(calls[0].args[3]))).toBe(dir);
    expect(calls[0].scriptExisted).toBe(true);
    expect(calls[0].script).toBe(payload.script);
    expect(scriptsLeft(dir)).toEqual([]);
  });

  test("non-zero exit is a submission failure and the script is still removed", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cueplay-at-"));
    const run = fakeRunner({ code: 1, stdout: "", stderr: "at: garbled time\n" }, []);
    await expect(new PosixAtScheduler(run).submit(target, payloadIn(dir))).rejects.toThrow(new SubmissionFailedError("at: garbled time"));
    expect(scriptsLeft(dir)).toEqual([]);
  });

  test("missing binary surfaces as ToolMissing and the script is removed", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cueplay-at-"));
    const run = fakeRunner(new ToolMissingError("at"), []);
    await expect(new PosixAtScheduler(run).submit(target, payloadIn(dir))).rejects.toBeInstanceOf(ToolMissingError);
    expect(scriptsLeft(dir)).toEqual([]);
  });
});

describe("windows task scheduler", () => {
  test("task name carries the target and the suffix", () => {
    expect(windowsTaskName(target, "abc123")).toBe("cueplay-20251004-083017-abc123");
    expect(windowsTaskName(target)).toMatch(/^cueplay-20251004-083017-[a-z0-9]{6}$/);
  });

  test("task command changes directory, waits out the seconds and runs cueplay", () => {
    const payload = buildJobPayload(
      { target, media: parseMediaReference(ID), mediaLiteral: ID, device: "Living Room" },
      { program: ["C:\\node\\node.exe", "C:\\cueplay\\index.js"], workDir: "C:\\Users\\me\\cue play" },
    );
    expect(windowsTaskCommand(payload)).toBe(
      `cmd /c "cd /d "C:\\Users\\me\\cue play" && timeout /t 17 /nobreak >nul && C:\\node\\node.exe C:\\cueplay\\index.js play ${ID} --now --device "Living Room" --no-browser"`,
    );
  });

  test("creates a one-shot task and returns its name", async () => {
    const calls: Call[] = [];
    const run = fakeRunner({ code: 0, stdout: "SUCCESS: The scheduled task was created.", stderr: "" }, calls);
    const label = await new WindowsTaskScheduler(run).submit(target, payloadIn("C:\\cue"));
    expect(label).toMatch(/^cueplay-20251004-083017-/);
    expect(calls[0].file).toBe("schtasks");
    const args = calls[0].args;
    expect(args.slice(0, 5)).toEqual(["/Create", "/SC", "ONCE", "/TN", label]);
    expect(args.slice(7)).toEqual(["/SD", "10/04/2025", "/ST", "08:30", "/F"]);
  });

  test("an overlong run command is refused before schtasks runs", async () => {
    const calls: Call[] = [];
    const run = fakeRunner({ code: 0, stdout: "", stderr: "" }, calls);
    const payload = payloadIn(`C:\\${"music-".repeat(40)}`);
    const length = windowsTaskCommand(payload).length;
    expect(length).toBeGreaterThan(MAX_TASK_RUN_LENGTH);
    await expect(new WindowsTaskScheduler(run).submit(target, payload)).rejects.toThrow(
      new SubmissionFailedError(
        `The task command is ${length} characters; Scheduled Tasks accepts at most 261. ` +
          "Use a shorter working directory, install path or media reference (a URI instead of a share link).",
      ),
    );
    expect(calls).toEqual([]);
  });

  test("failure carries schtasks' own text", async () => {
    const run = fakeRunner({ code: 1, stdout: "", stderr: "ERROR: Access is denied.\r\n" }, []);
    await expect(new WindowsTaskScheduler(run).submit(target, payloadIn("C:\\cue"))).rejects.toThrow("ERROR: Access is denied.");
  });
});

test("platform picks the strategy", () => {
  expect(createScheduler("win32").platform).toBe("windows");
  expect(createScheduler("linux").platform).toBe("posix");
  expect(createScheduler("darwin").platform).toBe("posix");
});
