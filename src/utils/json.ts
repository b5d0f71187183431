export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function getString(obj: unknown, key: string, fallback = ""): string {
  if (!isRecord(obj)) return fallback;
  const v = obj[key];
  return typeof v === "string" ? v : fallback;
}

export function getNumber(obj: unknown, key: string): number | null {
  if (!isRecord(obj)) return null;
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

export function getBoolean(obj: unknown, key: string): boolean {
  return isRecord(obj) && obj[key] === true;
}

export function getRecord(obj: unknown, key: string): JsonRecord {
  if (!isRecord(obj)) return {};
  const v = obj[key];
  return isRecord(v) ? v : {};
}

export function getArray(obj: unknown, key: string): unknown[] {
  if (!isRecord(obj)) return [];
  const v = obj[key];
  return Array.isArray(v) ? v : [];
}
