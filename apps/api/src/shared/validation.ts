// apps/api/src/shared/validation.ts
import { createPickemError } from "./errors";

/**
 * Parse a finite number (spreads may carry a half point).
 */
export function parseNumber(field: string, raw: unknown): number {
  const n = typeof raw === "number" ? raw : Number(raw);
  if (raw === null || raw === "" || !Number.isFinite(n)) {
    throw createPickemError("validation", `${field} must be a number`, { field, value: raw });
  }
  return n;
}

/**
 * Strict integer parse: throws a validation error instead of clamping.
 */
export function parseInteger(
  field: string,
  raw: unknown,
  options: { min?: number } = {}
): number {
  const n = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isInteger(n)) {
    throw createPickemError("validation", `${field} must be an integer`, { field, value: raw });
  }
  if (typeof options.min === "number" && n < options.min) {
    throw createPickemError("validation", `${field} must be >= ${options.min}`, {
      field,
      value: n
    });
  }
  return n;
}

/**
 * Ensure a value is one of the allowed literals.
 */
export function parseEnum<T extends string | number>(
  raw: unknown,
  allowed: readonly T[],
  options: { defaultValue?: T } = {}
): T | undefined {
  const match = allowed.find((value) => value === raw);
  return match ?? options.defaultValue;
}

export function assertId(field: string, raw: unknown): number {
  const n = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw createPickemError("validation", `Invalid ${field}`, { field, value: raw });
  }
  return n;
}

/** SQLite has no boolean type; flags are stored as 0/1. */
export function toFlag(value: boolean): 0 | 1 {
  return value ? 1 : 0;
}

export function fromFlag(value: number | null | undefined): boolean {
  return value === 1;
}
