import type { LatencyReport } from "@calltime/contracts";
import { TRACE_ISSUE_KINDS } from "@calltime/contracts";

/**
 * Short trace-quality summary for stderr.
 */
export function formatSummary(report: LatencyReport): string {
  const lines = [
    `[calltime] ${report.eventCount} events, ${report.intervalCount} calls measured in ${report.functions.length} function(s)`,
  ];

  for (const kind of TRACE_ISSUE_KINDS) {
    const count = report.issues[kind];
    if (count > 0) lines.push(`[calltime] ${kind}: ${count}`);
  }

  for (const q of report.quality) {
    if (!q.degraded) continue;
    const lost = q.orphanExits + q.discardedFrames + q.unterminatedCalls + q.negativeDurations;
    lines.push(
      `[calltime] ${q.functionId}: ${lost} call(s) lost; min/max/stdev may be unreliable`
    );
  }

  return lines.join("\n") + "\n";
}
