import type { IReportFormatter, LatencyReport } from "@calltime/contracts";
import { TIME_UNIT_NAMES, TRACE_ISSUE_KINDS } from "@calltime/contracts";

import { compareFunctionIds } from "../aggregator/StatisticsAggregator";

/**
 * Configuration for the TextReportFormatter.
 */
export interface TextReportFormatterConfig {
  /**
   * Significant digits for every number.
   * @default 6
   */
  precision?: number;

  /**
   * Append `## <kind> <count>` lines for non-zero issue counts.
   * @default true
   */
  includeIssues?: boolean;
}

const DEFAULT_CONFIG: Required<TextReportFormatterConfig> = {
  precision: 6,
  includeIssues: true,
};

/**
 * Whitespace-separated table, one row per function, with `#` comment lines
 * for the header and the trace-quality summary. Functions that were seen but
 * never completed a call get `-` placeholders.
 */
export class TextReportFormatter implements IReportFormatter {
  readonly id = "text";

  private config: Required<TextReportFormatterConfig>;

  constructor(config: TextReportFormatterConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.precision) || this.config.precision < 1 || this.config.precision > 21) {
      throw new Error(`precision must be an integer between 1 and 21, got ${this.config.precision}`);
    }
  }

  format(report: LatencyReport): string {
    const lines: string[] = [
      "# function mean min max stdev Ncalls",
      `## All timings in ${TIME_UNIT_NAMES[report.unit]}`,
    ];

    const rows = [
      ...report.functions.map((f) => ({
        id: f.functionId,
        cells: [
          this.num(f.mean),
          this.num(f.min),
          this.num(f.max),
          this.num(f.sampleStdDev),
          String(f.count),
        ],
      })),
      ...report.unmeasured.map((id) => ({ id, cells: ["-", "-", "-", "-", "0"] })),
    ].sort((a, b) => compareFunctionIds(a.id, b.id));

    for (const row of rows) {
      lines.push([row.id, ...row.cells].join(" "));
    }

    if (this.config.includeIssues) {
      for (const kind of TRACE_ISSUE_KINDS) {
        const count = report.issues[kind];
        if (count > 0) lines.push(`## ${kind} ${count}`);
      }
    }

    return lines.join("\n") + "\n";
  }

  private num(x: number): string {
    return String(Number(x.toPrecision(this.config.precision)));
  }
}
