/**
 * Diagnostic Collector
 *
 * Receives diagnostics from every pipeline stage of one run. Counts are kept
 * for every diagnostic; individual diagnostics are retained up to a limit so
 * a badly broken trace cannot grow memory without bound.
 */

import type {
  Diagnostic,
  FunctionId,
  IDiagnosticSink,
  TraceIssueCounts,
} from "@calltime/contracts";

import { emptyIssueCounts } from "@calltime/contracts";

/**
 * Configuration for the DiagnosticCollector.
 */
export interface DiagnosticCollectorConfig {
  /**
   * How many individual diagnostics to keep.
   * @default 1000
   */
  retainLimit?: number;

  /**
   * Echo each diagnostic to the console as it arrives.
   * @default false
   */
  echo?: boolean;
}

const DEFAULT_CONFIG: Required<DiagnosticCollectorConfig> = {
  retainLimit: 1000,
  echo: false,
};

export class DiagnosticCollector implements IDiagnosticSink {
  private config: Required<DiagnosticCollectorConfig>;
  private retained: Diagnostic[] = [];
  private totals: TraceIssueCounts = emptyIssueCounts();
  private perFunction: Map<FunctionId, TraceIssueCounts> = new Map();
  private droppedCount = 0;

  constructor(config: DiagnosticCollectorConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  report(diagnostic: Diagnostic): void {
    this.totals[diagnostic.kind]++;

    if (diagnostic.functionId !== undefined) {
      let counts = this.perFunction.get(diagnostic.functionId);
      if (!counts) {
        counts = emptyIssueCounts();
        this.perFunction.set(diagnostic.functionId, counts);
      }
      counts[diagnostic.kind]++;
    }

    if (this.retained.length < this.config.retainLimit) {
      this.retained.push(diagnostic);
    } else {
      this.droppedCount++;
    }

    if (this.config.echo) {
      this.echo(diagnostic);
    }
  }

  /**
   * Issue counts over the whole run.
   */
  counts(): TraceIssueCounts {
    return { ...this.totals };
  }

  /**
   * Issue counts attributed to one function.
   */
  countsFor(functionId: FunctionId): TraceIssueCounts {
    const counts = this.perFunction.get(functionId);
    return counts ? { ...counts } : emptyIssueCounts();
  }

  diagnostics(): readonly Diagnostic[] {
    return this.retained;
  }

  /** Diagnostics counted but not retained */
  get dropped(): number {
    return this.droppedCount;
  }

  reset(): void {
    this.retained = [];
    this.totals = emptyIssueCounts();
    this.perFunction.clear();
    this.droppedCount = 0;
  }

  private echo(diagnostic: Diagnostic): void {
    const prefix = `[${diagnostic.source ?? diagnostic.category}]`;
    if (diagnostic.severity === "info") {
      console.info(`${prefix} ${diagnostic.message}`);
    } else {
      console.warn(`${prefix} ${diagnostic.message}`);
    }
  }
}
