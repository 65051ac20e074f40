import type { FieldError } from "../core/errors.js";

const UINT = /^\d+$/;

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

/** Non-empty string after trimming, else undefined. */
export function asNonEmpty(v: unknown): string | undefined {
  const s = asString(v)?.trim();
  return s ? s : undefined;
}

/** Parse a decimal positive integer; undefined if the text is not one. */
export function asPositiveInt(v: unknown): number | undefined {
  const s = asNonEmpty(v);
  if (!s || !UINT.test(s)) return undefined;
  const n = Number(s);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

export function asOneOf<T extends string>(v: unknown, allowed: readonly T[]): T | undefined {
  const s = asNonEmpty(v)?.toLowerCase();
  return allowed.find((a) => a === s);
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
