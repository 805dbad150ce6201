import type { Timestamp } from "../core/time";
import type { ExecutionContextId, FunctionId } from "../probes/probes";

/**
 * Which pipeline stage emitted a diagnostic.
 */
export type DiagnosticCategory = "source" | "normalizer" | "correlator" | "aggregator";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * Trace-quality problems. All are recoverable: the offending record, event,
 * frame or interval is dropped and counted.
 */
export type TraceIssueKind =
  | "malformed_record"
  | "out_of_order_event"
  | "orphan_exit"
  | "discarded_frame"
  | "unterminated_call"
  | "negative_duration";

export const TRACE_ISSUE_KINDS: readonly TraceIssueKind[] = [
  "malformed_record",
  "out_of_order_event",
  "orphan_exit",
  "discarded_frame",
  "unterminated_call",
  "negative_duration",
] as const;

export type TraceIssueCounts = Record<TraceIssueKind, number>;

export function emptyIssueCounts(): TraceIssueCounts {
  return {
    malformed_record: 0,
    out_of_order_event: 0,
    orphan_exit: 0,
    discarded_frame: 0,
    unterminated_call: 0,
    negative_duration: 0,
  };
}

/**
 * A trace-quality diagnostic emitted when something is dropped but the run
 * continues.
 */
export interface Diagnostic {
  /** Unique identifier within a run */
  id: string;

  kind: TraceIssueKind;

  /** Category for grouping */
  category: DiagnosticCategory;

  /** Severity level */
  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** Trace time of the offending event, when known */
  timestamp: Timestamp | null;

  /** Optional: which component emitted this */
  source?: string;

  /** Optional: associated function */
  functionId?: FunctionId;

  /** Optional: associated execution context */
  executionContext?: ExecutionContextId;

  /** Optional: position of the offending record in its source */
  seq?: number;
}

/**
 * Receiver of diagnostics. Pipeline stages report through this instead of
 * throwing.
 */
export interface IDiagnosticSink {
  report(diagnostic: Diagnostic): void;
}
