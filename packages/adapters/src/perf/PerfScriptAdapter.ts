/**
 * Perf Script Adapter
 *
 * Reads the text output of `perf script` for a trace recorded with uprobes
 * on function entries and uretprobes on their returns. Timestamps are in
 * seconds.
 */

import type { TimeUnit } from "@calltime/contracts";

import { LineTraceAdapter, type LineTraceAdapterConfig } from "../LineTraceAdapter";
import type { TraceSource } from "../trace/TraceSource";
import { parsePerfScriptLine, type ContextKey } from "./parsePerfScript";

/**
 * Configuration for the PerfScriptAdapter.
 */
export interface PerfScriptAdapterConfig extends LineTraceAdapterConfig {
  /**
   * Which id identifies an execution context.
   * - "tid": each thread has its own call stack
   * - "pid": threads of a process share one (only for single-threaded targets)
   * @default "tid"
   */
  contextKey?: ContextKey;
}

export class PerfScriptAdapter extends LineTraceAdapter {
  readonly unit: TimeUnit = "s";

  private contextKey: ContextKey;

  constructor(traceSource: TraceSource, config: PerfScriptAdapterConfig = {}) {
    super(traceSource, "perf", config);
    this.contextKey = config.contextKey ?? "tid";
  }

  protected parseLine(line: string): Record<string, unknown> | null {
    return parsePerfScriptLine(line, this.contextKey);
  }
}
