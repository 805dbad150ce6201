export type { TraceSource } from "./TraceSource";
export { StreamTraceSource } from "./StreamTraceSource";
export { FileTraceSource } from "./FileTraceSource";
export { readLines } from "./readLines";
