/**
 * Statistics Aggregator
 *
 * Reduces CallIntervals into per-function latency statistics, one interval
 * at a time. A single instance belongs to one pipeline run: created at stream
 * start, read once at stream end.
 */

import type {
  IStatisticsAggregator,
  IDiagnosticSink,
  CallInterval,
  FunctionId,
  FunctionStats,
} from "@calltime/contracts";

import { RunningStats } from "./RunningStats";

export function compareFunctionIds(a: FunctionId, b: FunctionId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class StatisticsAggregator implements IStatisticsAggregator {
  readonly id = "aggregator";

  private accumulators: Map<FunctionId, RunningStats> = new Map();
  private sink: IDiagnosticSink | null;
  private diagnosticCount = 0;

  constructor(sink: IDiagnosticSink | null = null) {
    this.sink = sink;
  }

  add(interval: CallInterval): boolean {
    if (
      !Number.isFinite(interval.duration) ||
      interval.endTime < interval.startTime ||
      interval.duration < 0
    ) {
      this.sink?.report({
        id: `aggregator-${this.diagnosticCount++}`,
        kind: "negative_duration",
        category: "aggregator",
        severity: "warning",
        message: `Rejecting interval of ${interval.functionId} in context ${interval.executionContext}: end ${interval.endTime} precedes start ${interval.startTime}`,
        timestamp: interval.endTime,
        source: "Aggregator",
        functionId: interval.functionId,
        executionContext: interval.executionContext,
      });
      return false;
    }

    this.accumulatorFor(interval.functionId).push(interval.duration);
    return true;
  }

  observe(functionId: FunctionId): void {
    this.accumulatorFor(functionId);
  }

  get(functionId: FunctionId): FunctionStats | undefined {
    const acc = this.accumulators.get(functionId);
    if (!acc || acc.count === 0) return undefined;
    return acc.toStats(functionId);
  }

  snapshot(): FunctionStats[] {
    return this.sortedIds()
      .filter((id) => this.countOf(id) > 0)
      .map((id) => this.accumulatorFor(id).toStats(id));
  }

  unmeasured(): FunctionId[] {
    return this.sortedIds().filter((id) => this.countOf(id) === 0);
  }

  /**
   * Number of accepted intervals for a function (0 if never seen).
   */
  countOf(functionId: FunctionId): number {
    return this.accumulators.get(functionId)?.count ?? 0;
  }

  /**
   * Pool another aggregator's statistics into this one, e.g. when correlation
   * was sharded by execution context.
   */
  merge(other: StatisticsAggregator): void {
    for (const [functionId, acc] of other.accumulators) {
      this.accumulatorFor(functionId).merge(acc);
    }
  }

  reset(): void {
    this.accumulators.clear();
    this.diagnosticCount = 0;
  }

  private accumulatorFor(functionId: FunctionId): RunningStats {
    let acc = this.accumulators.get(functionId);
    if (!acc) {
      acc = new RunningStats();
      this.accumulators.set(functionId, acc);
    }
    return acc;
  }

  private sortedIds(): FunctionId[] {
    return Array.from(this.accumulators.keys()).sort(compareFunctionIds);
  }
}
