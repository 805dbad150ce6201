// Pipeline
export { LatencyPipeline, type LatencyRunResult } from "./LatencyPipeline";
export {
  LatencyPipelineConfigSchema,
  DEFAULT_PIPELINE_CONFIG,
  resolvePipelineConfig,
  type LatencyPipelineConfig,
  type ResolvedLatencyPipelineConfig,
} from "./config";

// Stages
export {
  EventStreamNormalizer,
  type EventStreamNormalizerConfig,
} from "./normalizer/EventStreamNormalizer";
export { ProbeRecordSchema } from "./normalizer/recordSchema";
export {
  CallCorrelator,
  type CallCorrelatorConfig,
  type MismatchPolicy,
} from "./correlator/CallCorrelator";
export { StatisticsAggregator } from "./aggregator/StatisticsAggregator";
export { RunningStats } from "./aggregator/RunningStats";

// Diagnostics
export {
  DiagnosticCollector,
  type DiagnosticCollectorConfig,
} from "./diagnostics/DiagnosticCollector";

// Report formatters
export * from "./report";
