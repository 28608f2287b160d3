import { BASELINE_PREFIX, TIMESTAMP_PATTERN } from "../constants.js";

export interface BaselineName {
  pipeline: string;
  timestamp: string;
}

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/** `YYYYMMDD_HHMMSS` in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function parseTimestamp(value: string): Date | null {
  if (!TIMESTAMP_PATTERN.test(value)) {
    return null;
  }
  const date = new Date(
    Date.UTC(
      Number(value.slice(0, 4)),
      Number(value.slice(4, 6)) - 1,
      Number(value.slice(6, 8)),
      Number(value.slice(9, 11)),
      Number(value.slice(11, 13)),
      Number(value.slice(13, 15))
    )
  );
  // Reject rollover such as month 13 or day 32.
  return formatTimestamp(date) === value ? date : null;
}

export function baselineFilename(pipeline: string, timestamp: string): string {
  return `${BASELINE_PREFIX}${pipeline}_${timestamp}.json`;
}

/** Split `baseline_<pipeline>_<YYYYMMDD>_<HHMMSS>.json`; the pipeline may contain underscores. */
export function parseBaselineFilename(filename: string): BaselineName | null {
  if (!filename.startsWith(BASELINE_PREFIX) || !filename.endsWith(".json")) {
    return null;
  }
  const stem = filename.slice(BASELINE_PREFIX.length, -".json".length);
  const parts = stem.split("_");
  if (parts.length < 3) {
    return null;
  }
  const timestamp = parts.slice(-2).join("_");
  const pipeline = parts.slice(0, -2).join("_");
  if (pipeline === "" || parseTimestamp(timestamp) === null) {
    return null;
  }
  return { pipeline, timestamp };
}
