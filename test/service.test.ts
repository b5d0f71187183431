import { describe, expect, test } from "vitest";
import { buildScheduleSpec, parseVolumeOption, scheduleSystemJob } from "../src/schedule/service.js";
import type { JobPayload } from "../src/schedule/command.js";
import type { OSJobScheduler } from "../src/schedule/scheduler.js";
import { ParseError, PastTimeError } from "../src/errors.js";

const LINK = "https://open.spotify.com/track/4uLU6hMCjMI75M1A2tKUQC?si=abc";

describe("building a schedule", () => {
  test("share link at 08:30 from 09:00 resolves to the next morning", () => {
    const spec = buildScheduleSpec({ media: LINK, time: "08:30" }, new Date(2025, 9, 3, 9, 0, 0));
    expect(spec.target).toEqual(new Date(2025, 9, 4, 8, 30, 0));
    expect(spec.media).toEqual({ kind: "track", id: "4uLU6hMCjMI75M1A2tKUQC" });
    expect(spec.mediaLiteral).toBe(LINK);
    expect(spec.device).toBeUndefined();
    expect(spec.volume).toBeUndefined();
  });

  test("media is checked before time", () => {
    expect(() => buildScheduleSpec({ media: "   ", time: "nope" })).toThrow("Media is required.");
    expect(() => buildScheduleSpec({ media: "bogus", time: "nope" })).toThrow("Unsupported media reference");
  });

  test("past explicit dates and bad volumes fail", () => {
    const now = new Date(2025, 9, 3, 9, 0, 0);
    expect(() => buildScheduleSpec({ media: LINK, time: "08:30", date: "2025-10-03" }, now)).toThrow(PastTimeError);
    expect(() => buildScheduleSpec({ media: LINK, time: "10:00", volume: "150" }, now)).toThrow(ParseError);
  });

  test("device is trimmed and blank means none", () => {
    const now = new Date(2025, 9, 3, 9, 0, 0);
    expect(buildScheduleSpec({ media: LINK, time: "10:00", device: "  Kitchen " }, now).device).toBe("Kitchen");
    expect(buildScheduleSpec({ media: LINK, time: "10:00", device: "  " }, now).device).toBeUndefined();
  });
});

describe("volume option", () => {
  test("accepts integers 0-100 and treats blank as unset", () => {
    expect(parseVolumeOption("0")).toBe(0);
    expect(parseVolumeOption(" 100 ")).toBe(100);
    expect(parseVolumeOption(25)).toBe(25);
    expect(parseVolumeOption("")).toBeUndefined();
    expect(parseVolumeOption(undefined)).toBeUndefined();
  });

  test("rejects everything else", () => {
    for (const bad of ["101", "-1", "5.5", "loud"]) {
      expect(() => parseVolumeOption(bad)).toThrow("Volume must be an integer between 0 and 100.");
    }
  });
});

test("system job builds the payload and hands it to the scheduler", async () => {
  const submitted: Array<{ target: Date; payload: JobPayload }> = [];
  const scheduler: OSJobScheduler = {
    platform: "posix",
    submit: async (target, payload) => {
      submitted.push({ target, payload });
      return "job 11 at Sat Oct  4 08:30:00 2025";
    },
  };
  const spec = buildScheduleSpec({ media: LINK, time: "08:30:45", volume: "20" }, new Date(2025, 9, 3, 9, 0, 0));
  const job = await scheduleSystemJob(spec, { scheduler, program: ["node", "/opt/cueplay/index.js"], workDir: "/srv" });
  expect(job.label).toBe("job 11 at Sat Oct  4 08:30:00 2025");
  expect(submitted).toHaveLength(1);
  expect(submitted[0].target).toEqual(new Date(2025, 9, 4, 8, 30, 45));
  expect(submitted[0].payload.sleepSeconds).toBe(45);
  expect(submitted[0].payload.command).toEqual(["node", "/opt/cueplay/index.js", "play", LINK, "--now", "--volume", "20", "--no-browser"]);
});
