/**
 * Helpers reading environment variables with predictable coercion rules. Every
 * reader accepts an optional `env` map so configuration loading stays testable
 * without mutating {@link process.env}.
 */
import process from "node:process";

import type { ProcessEnv } from "../nodePrimitives.js";

/** Options shared by every reader. */
export interface EnvSourceOptions {
  /** Variables to read from. Defaults to {@link process.env}. */
  readonly env?: ProcessEnv;
}

interface NumberOptions extends EnvSourceOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Returns the trimmed value of {@link name}, treating blanks as unset. */
function readRaw(name: string, options: EnvSourceOptions | undefined): string | undefined {
  const raw = (options?.env ?? process.env)[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Determines whether the provided value fits the numeric constraints. */
function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  // Infinity and NaN read as unset.
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = readRaw(name, options);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readOptionalString(name: string, options?: EnvSourceOptions): string | undefined {
  return readRaw(name, options);
}

/**
 * Reads an enum-like variable, comparing case-insensitively against the
 * allow-list. Unknown literals yield `undefined`.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  options?: EnvSourceOptions,
): T | undefined {
  const normalised = readRaw(name, options)?.toLowerCase();
  if (!normalised) {
    return undefined;
  }
  return allowed.find((value) => value.toLowerCase() === normalised);
}

/**
 * Splits a CSV literal into a deduplicated array, trimming whitespace and
 * ignoring empty segments. Insertion order is kept so operators can express
 * priorities (e.g. the provider fallback order).
 */
export function parseCsvList(value: string): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const segment of value.split(",")) {
    const item = segment.trim();
    const lower = item.toLowerCase();
    if (item.length === 0 || seen.has(lower)) {
      continue;
    }
    seen.add(lower);
    ordered.push(item);
  }
  return ordered;
}

/** Reads {@link name} as a CSV list; unset or blank variables yield `undefined`. */
export function readOptionalCsv(name: string, options?: EnvSourceOptions): string[] | undefined {
  const raw = readRaw(name, options);
  return raw === undefined ? undefined : parseCsvList(raw);
}
