/**
 * Pipeline Interfaces
 *
 * Contracts for the pipeline components:
 * source adapter → normalizer → correlator → aggregator → report formatter.
 */

import type { SourceId, StreamId } from "../core/provenance";
import type { TimeUnit } from "../core/time";
import type { RawRecordFrame } from "../raw/raw";
import type { CallInterval, FunctionId, ProbeEvent } from "../probes/probes";
import type { FunctionStats, LatencyReport } from "../stats/stats";

// ============================================================================
// Source Adapters
// ============================================================================

/**
 * Source adapter that emits raw probe-crossing records.
 *
 * Adapters bridge an external trace (perf script output, JSON records) to the
 * pipeline. All waiting on trace data happens here; nothing downstream blocks.
 */
export interface IRawTraceAdapter {
  readonly source: SourceId;
  readonly stream: StreamId;

  /** Unit of every timestamp this adapter emits */
  readonly unit: TimeUnit;

  /**
   * Get the next batch of raw records.
   * Resolves null once the trace is exhausted. Rejects only when the
   * underlying source cannot be opened or read.
   */
  nextFrame(): Promise<RawRecordFrame | null>;

  /** Release the underlying source. Safe to call more than once. */
  close?(): Promise<void>;
}

// ============================================================================
// Normalizer
// ============================================================================

/**
 * Validates raw records and releases them as canonical events in strict
 * time order.
 */
export interface IEventNormalizer {
  id: string;

  /** Called once before the first frame */
  init(): void;

  /** Called once when the run ends */
  dispose(): void;

  /**
   * Accept a frame of raw records.
   * @returns events that became releasable, in time order
   */
  apply(frame: RawRecordFrame): ProbeEvent[];

  /** Release everything still buffered (end of stream) */
  flush(): ProbeEvent[];

  /** Forget all buffered state and start a new run */
  reset(): void;
}

// ============================================================================
// Correlator
// ============================================================================

/**
 * Matches entry events to exit events per function and execution context.
 */
export interface ICallCorrelator {
  id: string;

  init(): void;

  dispose(): void;

  /**
   * Process time-ordered events.
   * @returns intervals completed by these events
   */
  apply(events: readonly ProbeEvent[]): CallInterval[];

  /** End of stream: drop every call still open */
  finish(): void;

  reset(): void;
}

// ============================================================================
// Aggregator
// ============================================================================

/**
 * Reduces call intervals into per-function statistics in a single pass.
 */
export interface IStatisticsAggregator {
  id: string;

  /**
   * Add one interval.
   * @returns false when the interval was rejected
   */
  add(interval: CallInterval): boolean;

  /** Register a function seen in the trace, measured or not */
  observe(functionId: FunctionId): void;

  get(functionId: FunctionId): FunctionStats | undefined;

  /** Read-only statistics of every measured function, ordered by id */
  snapshot(): FunctionStats[];

  /** Observed functions without a single completed call, ordered by id */
  unmeasured(): FunctionId[];

  reset(): void;
}

// ============================================================================
// Report
// ============================================================================

/**
 * Renders a finished report.
 */
export interface IReportFormatter {
  id: string;
  format(report: LatencyReport): string;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Drives one trace from source to report.
 */
export interface ILatencyPipeline {
  run(adapter: IRawTraceAdapter): Promise<LatencyReport>;
}
