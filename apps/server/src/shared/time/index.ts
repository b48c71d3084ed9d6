export const getMonotonicTime = (): number => {
  if (
    typeof performance !== "undefined" &&
    typeof performance.now === "function"
  ) {
    return performance.now();
  }
  return Date.now();
};

export const resolveTimestamp = (value?: number | null): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return Date.now();
};

export const toIsoString = (timestamp: number): string => {
  return new Date(timestamp).toISOString();
};

const pad = (value: number): string => String(value).padStart(2, "0");

/** `yyyyMMdd_HHmmss` in UTC, used for evidence file names. */
export const formatCompactUtc = (timestamp: number): string => {
  const date = new Date(timestamp);
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
};

export const sleep = (ms: number): Promise<void> => {
  return new Promise((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
};
