/**
 * Call Correlator
 *
 * Matches entry events to exit events per execution context. Each context
 * owns a stack of open frames; recursive invocations of the same function
 * match innermost-first. Contexts never share a stack, so concurrent calls
 * are timed independently.
 *
 * When an exit does not match the top of its stack, a crossing was lost
 * (missed probe, longjmp, signal). Frames above the match are discarded,
 * never paired with the wrong exit.
 */

import type {
  ICallCorrelator,
  IDiagnosticSink,
  CallInterval,
  ExecutionContextId,
  FunctionId,
  ProbeEvent,
  Timestamp,
  TraceIssueKind,
} from "@calltime/contracts";

/**
 * What to do with an exit that does not match the top frame.
 * - "unwind": pop and discard frames until a match or the stack empties;
 *   an exit that empties the stack is an orphan
 * - "search": look for a matching frame first and only unwind if one exists;
 *   an orphan exit leaves the stack untouched
 */
export type MismatchPolicy = "unwind" | "search";

/**
 * Configuration for the CallCorrelator.
 */
export interface CallCorrelatorConfig {
  /**
   * @default "unwind"
   */
  mismatchPolicy?: MismatchPolicy;
}

const DEFAULT_CONFIG: Required<CallCorrelatorConfig> = {
  mismatchPolicy: "unwind",
};

/**
 * A pending entry awaiting its exit.
 */
interface OpenFrame {
  functionId: FunctionId;
  startTime: Timestamp;
  depth: number;
  seq: number;
}

/**
 * Per-context state: the open-frame stack plus how many frames of each
 * function it holds (recursion depth).
 */
interface ContextState {
  stack: OpenFrame[];
  depths: Map<FunctionId, number>;
}

export class CallCorrelator implements ICallCorrelator {
  readonly id = "correlator";

  private config: Required<CallCorrelatorConfig>;
  private sink: IDiagnosticSink;
  private contexts: Map<ExecutionContextId, ContextState> = new Map();
  private maxDepths: Map<FunctionId, number> = new Map();
  private diagnosticCount = 0;

  constructor(sink: IDiagnosticSink, config: CallCorrelatorConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.sink = sink;
  }

  init(): void {
    this.reset();
  }

  dispose(): void {
    this.contexts.clear();
    this.maxDepths.clear();
  }

  reset(): void {
    this.contexts.clear();
    this.maxDepths.clear();
    this.diagnosticCount = 0;
  }

  apply(events: readonly ProbeEvent[]): CallInterval[] {
    const intervals: CallInterval[] = [];

    for (const event of events) {
      if (event.kind === "entry") {
        this.handleEntry(event);
      } else {
        const interval = this.handleExit(event);
        if (interval) intervals.push(interval);
      }
    }

    return intervals;
  }

  finish(): void {
    for (const [context, state] of this.contexts) {
      for (const frame of state.stack) {
        this.report(
          "unterminated_call",
          `Dropping call of ${frame.functionId} in context ${context} entered at ${frame.startTime}: no exit before end of trace`,
          frame.startTime,
          frame.functionId,
          context,
          frame.seq
        );
      }
    }
    this.contexts.clear();
  }

  /**
   * Deepest recursion seen per function over the run.
   */
  getMaxDepths(): ReadonlyMap<FunctionId, number> {
    return this.maxDepths;
  }

  /**
   * Number of open frames in a context.
   */
  openFrames(context: ExecutionContextId): number {
    return this.contexts.get(context)?.stack.length ?? 0;
  }

  private handleEntry(event: ProbeEvent): void {
    const state = this.getOrCreateContext(event.executionContext);
    const depth = (state.depths.get(event.functionId) ?? 0) + 1;
    state.depths.set(event.functionId, depth);

    if (depth > (this.maxDepths.get(event.functionId) ?? 0)) {
      this.maxDepths.set(event.functionId, depth);
    }

    state.stack.push({
      functionId: event.functionId,
      startTime: event.timestamp,
      depth,
      seq: event.seq,
    });
  }

  private handleExit(event: ProbeEvent): CallInterval | null {
    const state = this.contexts.get(event.executionContext);

    if (!state || state.stack.length === 0) {
      this.reportOrphan(event, "no open call in its context");
      return null;
    }

    if (
      this.config.mismatchPolicy === "search" &&
      !state.stack.some((f) => f.functionId === event.functionId)
    ) {
      this.reportOrphan(event, "no open call of this function in its context");
      return null;
    }

    let frame = this.popFrame(state);
    while (frame && frame.functionId !== event.functionId) {
      this.report(
        "discarded_frame",
        `Discarding open call of ${frame.functionId} in context ${event.executionContext} entered at ${frame.startTime}: unwound by exit of ${event.functionId} at ${event.timestamp}`,
        frame.startTime,
        frame.functionId,
        event.executionContext,
        frame.seq
      );
      frame = this.popFrame(state);
    }

    if (!frame) {
      this.reportOrphan(event, "stack emptied without a matching entry");
      return null;
    }

    if (event.timestamp < frame.startTime) {
      this.report(
        "negative_duration",
        `Rejecting call of ${event.functionId} in context ${event.executionContext}: exit at ${event.timestamp} precedes entry at ${frame.startTime}`,
        event.timestamp,
        event.functionId,
        event.executionContext,
        event.seq
      );
      return null;
    }

    return {
      functionId: event.functionId,
      executionContext: event.executionContext,
      startTime: frame.startTime,
      endTime: event.timestamp,
      duration: event.timestamp - frame.startTime,
      depth: frame.depth,
    };
  }

  private popFrame(state: ContextState): OpenFrame | undefined {
    const frame = state.stack.pop();
    if (frame) {
      const remaining = (state.depths.get(frame.functionId) ?? 1) - 1;
      if (remaining > 0) {
        state.depths.set(frame.functionId, remaining);
      } else {
        state.depths.delete(frame.functionId);
      }
    }
    return frame;
  }

  private getOrCreateContext(context: ExecutionContextId): ContextState {
    let state = this.contexts.get(context);
    if (!state) {
      state = { stack: [], depths: new Map() };
      this.contexts.set(context, state);
    }
    return state;
  }

  private reportOrphan(event: ProbeEvent, reason: string): void {
    this.report(
      "orphan_exit",
      `Discarding exit of ${event.functionId} in context ${event.executionContext} at ${event.timestamp}: ${reason}`,
      event.timestamp,
      event.functionId,
      event.executionContext,
      event.seq
    );
  }

  private report(
    kind: TraceIssueKind,
    message: string,
    timestamp: Timestamp,
    functionId: FunctionId,
    executionContext: ExecutionContextId,
    seq: number
  ): void {
    this.sink.report({
      id: `correlator-${this.diagnosticCount++}`,
      kind,
      category: "correlator",
      severity: "warning",
      message,
      timestamp,
      source: "Correlator",
      functionId,
      executionContext,
      seq,
    });
  }
}
