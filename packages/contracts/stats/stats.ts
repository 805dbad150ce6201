import type { Duration, TimeUnit } from "../core/time";
import type { FunctionId } from "../probes/probes";
import type { TraceIssueCounts } from "../diagnostics/diagnostics";

/**
 * Latency statistics of one function, in the trace's time unit.
 */
export interface FunctionStats {
  readonly functionId: FunctionId;
  readonly count: number;
  readonly mean: Duration;
  readonly min: Duration;
  readonly max: Duration;
  /** 0 when count is 1 */
  readonly sampleStdDev: Duration;
}

/**
 * How much the trace of one function was affected by lost crossings.
 *
 * Count and mean always cover exactly the matched calls. When `degraded` is
 * set, min/max/stdev may be biased because some invocations were dropped.
 */
export interface FunctionQuality {
  readonly functionId: FunctionId;
  /** Deepest recursion of this function seen in any single context */
  readonly maxDepth: number;
  readonly orphanExits: number;
  readonly discardedFrames: number;
  readonly unterminatedCalls: number;
  readonly negativeDurations: number;
  readonly degraded: boolean;
}

/**
 * Final output of one pipeline run.
 */
export interface LatencyReport {
  unit: TimeUnit;
  /** Measured functions, ordered by functionId */
  functions: FunctionStats[];
  /** Functions seen in the trace that never completed a call */
  unmeasured: FunctionId[];
  quality: FunctionQuality[];
  issues: TraceIssueCounts;
  eventCount: number;
  intervalCount: number;
}
