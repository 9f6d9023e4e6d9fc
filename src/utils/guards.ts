/** Runtime guards for JSON coming off the wire. */

/** True for plain objects (not arrays, not null). */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Safely coerce an unknown value to a string-keyed record. */
export function toRecord(v: unknown): Record<string, unknown> {
  return isRecord(v) ? v : {};
}

/** Keep only the string elements of an unknown value. */
export function toStringArray(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === "string") : [];
}

/** True when the value is an array made only of strings. */
export function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((s) => typeof s === "string");
}

/** Keep only the string-valued entries of an unknown map. */
export function toStringMap(v: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(toRecord(v))) {
    if (typeof value === "string") out[key] = value;
  }
  return out;
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
