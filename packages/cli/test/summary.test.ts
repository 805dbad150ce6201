import { describe, it, expect } from "vitest";
import { formatSummary } from "../src/summary";
import { emptyIssueCounts, type LatencyReport } from "@calltime/contracts";

describe("formatSummary", () => {
  it("prints event and call counts for a clean trace", () => {
    const report: LatencyReport = {
      unit: "s",
      functions: [{ functionId: "a!f", count: 2, mean: 1, min: 1, max: 1, sampleStdDev: 0 }],
      unmeasured: [],
      quality: [],
      issues: emptyIssueCounts(),
      eventCount: 4,
      intervalCount: 2,
    };

    expect(formatSummary(report)).toBe("[calltime] 4 events, 2 calls measured in 1 function(s)\n");
  });

  it("lists issues and degraded functions", () => {
    const report: LatencyReport = {
      unit: "s",
      functions: [],
      unmeasured: ["a!f"],
      quality: [
        {
          functionId: "a!f",
          maxDepth: 1,
          orphanExits: 1,
          discardedFrames: 2,
          unterminatedCalls: 0,
          negativeDurations: 0,
          degraded: true,
        },
      ],
      issues: { ...emptyIssueCounts(), orphan_exit: 1, discarded_frame: 2 },
      eventCount: 3,
      intervalCount: 0,
    };

    expect(formatSummary(report).split("\n")).toEqual([
      "[calltime] 3 events, 0 calls measured in 0 function(s)",
      "[calltime] orphan_exit: 1",
      "[calltime] discarded_frame: 2",
      "[calltime] a!f: 3 call(s) lost; min/max/stdev may be unreliable",
      "",
    ]);
  });
});
