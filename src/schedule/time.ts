import { ErrorCode, ParseError, PastTimeError } from "../errors.js";

export interface TimeSpec {
  at?: string;
  time?: string;
  date?: string;
}

export interface ClockTime {
  hours: number;
  minutes: number;
  seconds: number;
}

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

function validDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function inClockRange(h: number, m: number, s: number): boolean {
  return h >= 0 && h < 24 && m >= 0 && m < 60 && s >= 0 && s < 60;
}

export function parseClock(text: string): ClockTime {
  const parts = text.trim().split(":");
  if (parts.length !== 2 && parts.length !== 3) throw new ParseError("Use HH:MM or HH:MM:SS for --time.");
  if (!parts.every((p) => /^\d{1,2}$/.test(p))) throw new ParseError("Clock values must be integers.");
  const [hours, minutes, seconds = 0] = parts.map(Number);
  if (!inClockRange(hours, minutes, seconds)) throw new ParseError("Clock values are out of range.");
  return { hours, minutes, seconds };
}

/** Calendar date as a local-midnight Date. */
export function parseDate(text: string): Date {
  const m = text.trim().match(DATE_RE);
  const [year, month, day] = m ? [Number(m[1]), Number(m[2]), Number(m[3])] : [0, 0, 0];
  if (!m || !validDate(year, month, day)) throw new ParseError("Unable to parse --date. Use YYYY-MM-DD.");
  return new Date(year, month - 1, day);
}

/**
 * ISO-8601 date or date-time. Without a zone designator the value is local
 * time; with `Z` or an offset it is converted from that zone.
 */
export function parseDateTime(text: string): Date {
  const fail = () => new ParseError("Unable to parse --at. Use ISO format, e.g. 2025-10-03T08:30 or 2025-10-03 08:30.");
  const m = text.trim().match(DATETIME_RE);
  if (!m) throw fail();
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const [h, min, s] = [Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0)];
  const ms = m[7] ? Math.floor(Number(`0.${m[7]}`) * 1000) : 0;
  if (!validDate(year, month, day) || !inClockRange(h, min, s)) throw fail();

  const zone = m[8];
  if (!zone) return new Date(year, month - 1, day, h, min, s, ms);
  const utc = Date.UTC(year, month - 1, day, h, min, s, ms);
  if (zone === "Z") return new Date(utc);
  const digits = zone.slice(1).replace(":", "");
  const offsetMin = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  const sign = zone.startsWith("-") ? -1 : 1;
  return new Date(utc - sign * offsetMin * 60_000);
}

function combine(day: Date, clock: ClockTime): Date {
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), clock.hours, clock.minutes, clock.seconds);
}

function addDays(d: Date, days: number): Date {
  // setDate keeps the wall-clock time across DST changes
  const out = new Date(d.getTime());
  out.setDate(out.getDate() + days);
  return out;
}

/**
 * Resolves `--at`, or `--time` with an optional `--date`, to a future instant.
 * A clock time without a date means its next occurrence; an explicit date in
 * the past is an error and never rolls forward.
 */
export function resolveTarget(spec: TimeSpec, now: Date = new Date()): Date {
  if (spec.at !== undefined) {
    const target = parseDateTime(spec.at);
    if (target.getTime() <= now.getTime()) throw new PastTimeError("The --at datetime must be in the future.");
    return target;
  }

  const time = spec.time?.trim();
  if (!time) throw new ParseError("Provide either --at or --time.", ErrorCode.INVALID_SPEC);
  const clock = parseClock(time);
  const date = spec.date?.trim();

  if (date) {
    const candidate = combine(parseDate(date), clock);
    if (candidate.getTime() <= now.getTime()) throw new PastTimeError("The chosen date/time is in the past.");
    return candidate;
  }

  const candidate = combine(now, clock);
  return candidate.getTime() <= now.getTime() ? addDays(candidate, 1) : candidate;
}

export function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatLocal(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** `YYYY-MM-DDTHH:MM:SS` in local time, as written into job markers. */
export function formatLocalIso(d: Date): string {
  return formatLocal(d).replace(" ", "T");
}

export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(total % 60)}`;
}

