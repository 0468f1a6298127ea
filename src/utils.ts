// Shared utilities for the Interview Coach Engine.
//
// Small deterministic helpers used by the normalizer, rule config loader and
// server so they agree on how untrusted JSON is inspected.

/** True for plain JSON-style objects (not arrays, not null). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Clamp `value` into [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
