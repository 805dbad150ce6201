// Allow known source types with autocomplete, plus arbitrary strings
// eslint-disable-next-line @typescript-eslint/ban-types
export type SourceId = "perf" | "jsonl" | (string & {});
export type StreamId = string;

