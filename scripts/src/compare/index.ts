export { ThresholdRegistry, toMetricRule } from "./registry.js";
export { computeDelta } from "./delta.js";
export { classifyMetric, classifySeverity, excessRatio, HIGH_SEVERITY_EXCESS_RATIO } from "./classifier.js";
export { compareMetrics } from "./comparer.js";
export type { CompareMetricsOptions } from "./comparer.js";
export {
  comparePipeline,
  buildModelComparison,
  generateSummary,
  severityName,
  toRunSnapshot,
  UNKNOWN
} from "./pipeline.js";
export type { ComparePipelineOptions, ComparisonObserver } from "./pipeline.js";
