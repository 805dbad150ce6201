import type { IReportFormatter, LatencyReport } from "@calltime/contracts";

/**
 * The report as indented JSON, for scripts that post-process results.
 */
export class JsonReportFormatter implements IReportFormatter {
  readonly id = "json";

  constructor(private readonly indent: number = 2) {}

  format(report: LatencyReport): string {
    return JSON.stringify(report, null, this.indent) + "\n";
  }
}
