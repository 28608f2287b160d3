export type MetricKind = "time" | "bytes" | "percentage" | "count" | "credits" | "generic";

export interface FormattedMetric {
  formatted: string | null;
  kind: MetricKind;
}

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

const TIME_HINTS = ["_ms", "_time", "duration"];
const COUNT_HINTS = ["_count", "_number", "depth", "partitions", "rows"];
const BYTE_HINTS = ["_bytes", "spilling", "scanned", "memory"];
const PERCENT_HINTS = ["percent", "ratio"];

export function formatMilliseconds(value: number): string {
  if (value < 1000) return `${value.toFixed(2)} ms`;
  if (value < 60000) return `${(value / 1000).toFixed(2)} s`;
  return `${(value / 60000).toFixed(2)} min`;
}

export function formatBytes(value: number): string {
  let scaled = value;
  let unit = 0;
  while (scaled >= 1024 && unit < BYTE_UNITS.length - 1) {
    scaled /= 1024;
    unit += 1;
  }
  return `${scaled.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

export function formatPercentage(value: number): string {
  if (value === Infinity) return "inf %";
  if (value === -Infinity) return "-inf %";
  return `${value.toFixed(2)}%`;
}

export function formatCount(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function metricKind(metricName: string): MetricKind {
  const name = metricName.toLowerCase();
  const has = (hints: string[]) => hints.some((hint) => name.includes(hint));
  if (has(TIME_HINTS)) return "time";
  if (has(COUNT_HINTS)) return "count";
  if (has(BYTE_HINTS)) return "bytes";
  if (has(PERCENT_HINTS)) return "percentage";
  if (name.includes("credit")) return "credits";
  return "generic";
}

/**
 * Human-readable rendering chosen from the metric name. Ratios are stored as
 * fractions and shown as percentages.
 */
export function formatMetric(value: number | null, metricName: string): FormattedMetric {
  if (value === null) {
    return { formatted: null, kind: "generic" };
  }
  const kind = metricKind(metricName);
  switch (kind) {
    case "time":
      return { formatted: formatMilliseconds(value), kind };
    case "count":
      return { formatted: formatCount(value), kind };
    case "bytes":
      return { formatted: formatBytes(value), kind };
    case "percentage":
      return {
        formatted: formatPercentage(metricName.toLowerCase().includes("ratio") ? value * 100 : value),
        kind
      };
    case "credits":
      return { formatted: value.toFixed(2), kind };
    case "generic":
      return { formatted: String(value), kind };
  }
}
