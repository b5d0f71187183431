import { describe, expect, test } from "vitest";
import { formatDuration, formatLocal, parseClock, parseDateTime, resolveTarget } from "../src/schedule/time.js";
import { ErrorCode, ParseError, PastTimeError } from "../src/errors.js";

const now = new Date(2025, 0, 1, 10, 0, 0);

describe("clock parsing", () => {
  test("HH:MM and HH:MM:SS", () => {
    expect(parseClock("08:30")).toEqual({ hours: 8, minutes: 30, seconds: 0 });
    expect(parseClock("23:59:59")).toEqual({ hours: 23, minutes: 59, seconds: 59 });
  });

  test("rejects 24:00, out of range and malformed values", () => {
    expect(() => parseClock("24:00")).toThrow("Clock values are out of range.");
    expect(() => parseClock("12:60")).toThrow("Clock values are out of range.");
    expect(() => parseClock("12")).toThrow("Use HH:MM or HH:MM:SS for --time.");
    expect(() => parseClock("ab:cd")).toThrow("Clock values must be integers.");
  });
});

describe("target resolution", () => {
  test("a clock time already past today rolls to tomorrow", () => {
    expect(resolveTarget({ time: "09:00" }, now)).toEqual(new Date(2025, 0, 2, 9, 0, 0));
  });

  test("a clock time still ahead today stays today", () => {
    expect(resolveTarget({ time: "11:00" }, now)).toEqual(new Date(2025, 0, 1, 11, 0, 0));
  });

  test("a clock time equal to now counts as past and rolls over", () => {
    expect(resolveTarget({ time: "10:00:00" }, now)).toEqual(new Date(2025, 0, 2, 10, 0, 0));
  });

  test("an explicit past date fails instead of rolling forward", () => {
    expect(() => resolveTarget({ time: "23:00", date: "2024-12-31" }, now)).toThrow(PastTimeError);
    expect(() => resolveTarget({ time: "09:00", date: "2025-01-01" }, now)).toThrow("The chosen date/time is in the past.");
    expect(() => resolveTarget({ time: "10:00", date: "2025-01-01" }, now)).toThrow(PastTimeError);
  });

  test("an explicit future date is combined with the time", () => {
    expect(resolveTarget({ time: "07:15:30", date: "2025-02-28" }, now)).toEqual(new Date(2025, 1, 28, 7, 15, 30));
  });

  test("bad dates are parse errors", () => {
    expect(() => resolveTarget({ time: "07:00", date: "2025-02-30" }, now)).toThrow(ParseError);
    expect(() => resolveTarget({ time: "07:00", date: "03/02/2025" }, now)).toThrow("Unable to parse --date. Use YYYY-MM-DD.");
  });

  test("--at wins over the other fields", () => {
    expect(resolveTarget({ at: "2025-01-05T06:45", time: "not-a-time", date: "junk" }, now)).toEqual(new Date(2025, 0, 5, 6, 45, 0));
    expect(resolveTarget({ at: "2025-01-05 06:45:10" }, now)).toEqual(new Date(2025, 0, 5, 6, 45, 10));
  });

  test("--at in the past or equal to now fails", () => {
    expect(() => resolveTarget({ at: "2025-01-01T10:00:00" }, now)).toThrow("The --at datetime must be in the future.");
    expect(() => resolveTarget({ at: "2024-06-01T10:00" }, now)).toThrow(PastTimeError);
  });

  test("neither --at nor --time is rejected", () => {
    let caught: unknown;
    try {
      resolveTarget({ date: "2025-02-01" }, now);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_SPEC, message: "Provide either --at or --time." });
  });

  test("a blank --at is a parse failure, not a missing option", () => {
    let caught: unknown;
    try {
      resolveTarget({ at: "   ", time: "11:00" }, now);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({
      code: ErrorCode.PARSE_ERROR,
      message: "Unable to parse --at. Use ISO format, e.g. 2025-10-03T08:30 or 2025-10-03 08:30.",
    });
  });

  test("spotify share link example at 08:30 from 09:00 lands on the next morning", () => {
    const target = resolveTarget({ time: "08:30" }, new Date(2025, 9, 3, 9, 0, 0));
    expect(target).toEqual(new Date(2025, 9, 4, 8, 30, 0));
  });
});

describe("ISO parsing", () => {
  test("date-only means local midnight", () => {
    expect(parseDateTime("2025-03-04")).toEqual(new Date(2025, 2, 4));
  });

  test("zone designators", () => {
    expect(parseDateTime("2025-03-04T08:30:00Z").toISOString()).toBe("2025-03-04T08:30:00.000Z");
    expect(parseDateTime("2025-03-04T08:30:00+02:00").toISOString()).toBe("2025-03-04T06:30:00.000Z");
    expect(parseDateTime("2025-03-04T08:30:00.250-0130").toISOString()).toBe("2025-03-04T10:00:00.250Z");
  });

  test("rejects garbage and impossible values", () => {
    expect(() => parseDateTime("tomorrow")).toThrow(ParseError);
    expect(() => parseDateTime("2025-13-01T00:00")).toThrow(ParseError);
    expect(() => parseDateTime("2025-01-01T25:00")).toThrow(ParseError);
  });
});

describe("formatting", () => {
  test("local timestamp and duration", () => {
    expect(formatLocal(new Date(2025, 9, 4, 8, 30, 5))).toBe("2025-10-04 08:30:05");
    expect(formatDuration(3 * 3600_000 + 2 * 60_000 + 9_500)).toBe("03:02:09");
  });
});
