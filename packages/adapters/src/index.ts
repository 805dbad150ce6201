export { LineTraceAdapter, type LineTraceAdapterConfig } from "./LineTraceAdapter";
export * from "./trace";
export * from "./perf";
export * from "./jsonl";
