import { ValidationError } from "../database/errors";

/**
 * Validate that a string is not empty and return the trimmed value
 */
export function requireString(value: string | undefined, field: string): string {
  if (value === undefined || value.trim().length === 0) {
    throw new ValidationError(field, "is required and cannot be empty");
  }
  return value.trim();
}

/**
 * Validate a TTL in seconds. Undefined falls back to the default.
 */
export function requireTtl(value: number | undefined, field: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(field, `must be a non-negative integer (got ${value})`);
  }
  return value;
}

/**
 * Validate a row id
 */
export function requireId(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(field, `must be a positive integer (got ${value})`);
  }
  return value;
}

/**
 * Validate that a value is one of a fixed set
 */
export function requireOneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  field: string,
  fallback: T
): T {
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(field, `must be one of ${allowed.join(", ")} (got "${value}")`);
  }
  return match;
}
