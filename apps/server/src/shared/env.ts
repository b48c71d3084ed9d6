export const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) {
    return min;
  }
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
};

type NumericOptions = {
  min: number;
  max: number;
  integer?: boolean;
};

export const parseNumericEnv = (
  value: string | null | undefined,
  options: NumericOptions,
): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = options.integer
    ? Number.parseInt(trimmed, 10)
    : Number.parseFloat(trimmed);
  if (!Number.isFinite(parsed)) {
    return null;
  }
  return clamp(parsed, options.min, options.max);
};

/**
 * Splits a comma separated env value and keeps the entries accepted by
 * `guard`. Returns null when nothing usable remains.
 */
export const parseListEnv = <T extends string>(
  value: string | null | undefined,
  guard: (entry: string) => entry is T,
): T[] | null => {
  if (typeof value !== "string") {
    return null;
  }
  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(guard);
  if (entries.length === 0) {
    return null;
  }
  return Array.from(new Set(entries));
};

export const getEnvVar = (key: string): string | undefined => {
  if (typeof process !== "undefined" && process?.env?.[key] !== undefined) {
    return process.env[key];
  }
  return undefined;
};
