/**
 * Latency Pipeline
 *
 * Orchestrates one trace from source to report:
 * IRawTraceAdapter → EventStreamNormalizer → CallCorrelator → StatisticsAggregator
 *
 * Every run gets fresh stage instances and a fresh DiagnosticCollector;
 * nothing is shared between runs.
 */

import type {
  ILatencyPipeline,
  IRawTraceAdapter,
  Diagnostic,
  FunctionId,
  FunctionQuality,
  LatencyReport,
  ProbeEvent,
} from "@calltime/contracts";

import {
  resolvePipelineConfig,
  type LatencyPipelineConfig,
  type ResolvedLatencyPipelineConfig,
} from "./config";
import { DiagnosticCollector } from "./diagnostics/DiagnosticCollector";
import { EventStreamNormalizer } from "./normalizer/EventStreamNormalizer";
import { CallCorrelator } from "./correlator/CallCorrelator";
import { StatisticsAggregator, compareFunctionIds } from "./aggregator/StatisticsAggregator";

/**
 * Report plus the diagnostics raised while producing it.
 */
export interface LatencyRunResult {
  report: LatencyReport;
  diagnostics: readonly Diagnostic[];
  /** Diagnostics counted in the report but not retained */
  droppedDiagnostics: number;
}

export class LatencyPipeline implements ILatencyPipeline {
  private config: ResolvedLatencyPipelineConfig;

  constructor(config: LatencyPipelineConfig = {}) {
    this.config = resolvePipelineConfig(config);
  }

  async run(adapter: IRawTraceAdapter): Promise<LatencyReport> {
    const result = await this.analyze(adapter);
    return result.report;
  }

  /**
   * Run the trace to its end. Rejects only if the adapter fails to open or
   * read its source; that error is passed through as is.
   */
  async analyze(adapter: IRawTraceAdapter): Promise<LatencyRunResult> {
    const collector = new DiagnosticCollector({
      retainLimit: this.config.retainDiagnostics,
      echo: this.config.echoDiagnostics,
    });
    const normalizer = new EventStreamNormalizer(collector, {
      maxSkew: this.config.maxSkew,
      maxBufferedEvents: this.config.maxBufferedEvents,
    });
    const correlator = new CallCorrelator(collector, {
      mismatchPolicy: this.config.mismatchPolicy,
    });
    const aggregator = new StatisticsAggregator(collector);

    normalizer.init();
    correlator.init();

    let eventCount = 0;
    let intervalCount = 0;

    const consume = (events: ProbeEvent[]): void => {
      eventCount += events.length;
      for (const event of events) {
        aggregator.observe(event.functionId);
      }
      for (const interval of correlator.apply(events)) {
        if (aggregator.add(interval)) intervalCount++;
      }
    };

    try {
      let frame = await adapter.nextFrame();
      while (frame) {
        consume(normalizer.apply(frame));
        frame = await adapter.nextFrame();
      }
    } catch (err) {
      // The read error is what the caller gets, whatever close does
      await this.closeAfterFailure(adapter);
      throw err;
    }
    await adapter.close?.();

    consume(normalizer.flush());
    correlator.finish();

    const functions = aggregator.snapshot();
    const unmeasured = aggregator.unmeasured();
    const observed = [...functions.map((f) => f.functionId), ...unmeasured].sort(
      compareFunctionIds
    );

    const report: LatencyReport = {
      unit: adapter.unit,
      functions,
      unmeasured,
      quality: observed.map((id) =>
        this.qualityOf(id, collector, correlator.getMaxDepths())
      ),
      issues: collector.counts(),
      eventCount,
      intervalCount,
    };

    normalizer.dispose();
    correlator.dispose();

    return {
      report,
      diagnostics: collector.diagnostics(),
      droppedDiagnostics: collector.dropped,
    };
  }

  private async closeAfterFailure(adapter: IRawTraceAdapter): Promise<void> {
    try {
      await adapter.close?.();
    } catch (closeError) {
      console.warn(`[LatencyPipeline] Failed to close ${adapter.stream} after a read error:`, closeError);
    }
  }

  private qualityOf(
    functionId: FunctionId,
    collector: DiagnosticCollector,
    maxDepths: ReadonlyMap<FunctionId, number>
  ): FunctionQuality {
    const counts = collector.countsFor(functionId);
    const lost =
      counts.orphan_exit +
      counts.discarded_frame +
      counts.unterminated_call +
      counts.negative_duration;

    return {
      functionId,
      maxDepth: maxDepths.get(functionId) ?? 0,
      orphanExits: counts.orphan_exit,
      discardedFrames: counts.discarded_frame,
      unterminatedCalls: counts.unterminated_call,
      negativeDurations: counts.negative_duration,
      degraded: lost > 0,
    };
  }
}
