import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { buildJobPayload, buildMarker, findActivateScript, type ScheduleSpec } from "../src/schedule/command.js";
import { parseMediaReference } from "../src/media/reference.js";
import { extractMedia, extractVolume, parseJobScript } from "../src/schedule/inspector.js";

const ID = "4uLU6hMCjMI75M1A2tKUQC";
const LINK = `https://open.spotify.com/track/${ID}?si=abc`;
const PROGRAM = ["/usr/bin/node", "/opt/cueplay/dist/index.js"];

function spec(overrides: Partial<ScheduleSpec> = {}): ScheduleSpec {
  return {
    target: new Date(2025, 9, 4, 8, 30, 17),
    media: parseMediaReference(LINK),
    mediaLiteral: LINK,
    device: "Kitchen",
    volume: 40,
    ...overrides,
  };
}

describe("job payload", () => {
  test("script layout", () => {
    const payload = buildJobPayload(spec(), { program: PROGRAM, workDir: "/home/me/music box" });
    expect(payload.sleepSeconds).toBe(17);
    expect(payload.script).toBe([
      "#!/bin/sh",
      `# cueplay-job media=spotify:track:${ID} target=2025-10-04T08:30:17 device=Kitchen volume=40`,
      "cd '/home/me/music box'",
      "sleep 17",
      `/usr/bin/node /opt/cueplay/dist/index.js play '${LINK}' --now --device Kitchen --volume 40 --no-browser`,
      "",
    ].join("\n"));
  });

  test("device and volume are optional; --no-browser is always last", () => {
    const payload = buildJobPayload(spec({ device: undefined, volume: undefined }), { program: PROGRAM, workDir: "/tmp" });
    expect(payload.command).toEqual([...PROGRAM, "play", LINK, "--now", "--no-browser"]);
  });

  test("activation script is dot-sourced before the command", () => {
    const payload = buildJobPayload(spec(), { program: PROGRAM, workDir: "/srv/cue", activateScript: "/srv/cue/.envrc" });
    const lines = payload.script.trimEnd().split("\n");
    expect(lines[4]).toBe(". /srv/cue/.envrc");
    expect(lines[5]).toBe(payload.commandLine);
  });

  test("hostile device names stay one argument", () => {
    const payload = buildJobPayload(spec({ device: "Den'; rm -rf ~; echo '" }), { program: PROGRAM, workDir: "/tmp" });
    expect(payload.commandLine).toContain(`--device 'Den'"'"'; rm -rf ~; echo '"'"''`);
    expect(buildMarker(spec({ device: "Living Room" }))).toContain("device=Living%20Room");
  });

  test("the script reads back to the same sleep, command, media and volume", () => {
    const payload = buildJobPayload(spec(), { program: PROGRAM, workDir: "/home/me/music box" });
    const parsed = parseJobScript(payload.script);
    expect(parsed.sleepSeconds).toBe(17);
    expect(parsed.command).toBe(payload.commandLine);
    expect(parsed.marker).toEqual({ media: { kind: "track", id: ID }, target: "2025-10-04T08:30:17", device: "Kitchen", volume: 40 });
    expect(extractMedia(payload.commandLine, "index.js")).toEqual({ kind: "track", id: ID });
    expect(extractVolume(payload.commandLine)).toBe(40);
  });
});

describe("activation script discovery", () => {
  test("configured path first, then .envrc, then .env.sh", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cueplay-env-"));
    expect(findActivateScript(dir)).toBeUndefined();

    fs.writeFileSync(path.join(dir, ".env.sh"), "export A=1\n");
    expect(findActivateScript(dir)).toBe(path.join(dir, ".env.sh"));

    fs.writeFileSync(path.join(dir, ".envrc"), "export A=2\n");
    expect(findActivateScript(dir)).toBe(path.join(dir, ".envrc"));

    fs.mkdirSync(path.join(dir, "env"));
    fs.writeFileSync(path.join(dir, "env", "activate.sh"), "export A=3\n");
    expect(findActivateScript(dir, "env/activate.sh")).toBe(path.join(dir, "env", "activate.sh"));
    expect(findActivateScript(dir, "missing.sh")).toBe(path.join(dir, ".envrc"));
  });
});
