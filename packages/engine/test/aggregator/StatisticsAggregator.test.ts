import { describe, it, expect, beforeEach } from "vitest";
import { StatisticsAggregator } from "../../src/aggregator/StatisticsAggregator";
import { DiagnosticCollector } from "../../src/diagnostics/DiagnosticCollector";
import type { CallInterval } from "@calltime/contracts";

function interval(functionId: string, startTime: number, endTime: number, executionContext = 1): CallInterval {
  return {
    functionId,
    executionContext,
    startTime,
    endTime,
    duration: endTime - startTime,
    depth: 1,
  };
}

describe("StatisticsAggregator", () => {
  let sink: DiagnosticCollector;
  let aggregator: StatisticsAggregator;

  beforeEach(() => {
    sink = new DiagnosticCollector();
    aggregator = new StatisticsAggregator(sink);
  });

  it("aggregates durations per function", () => {
    aggregator.add(interval("a!f", 0, 1));
    aggregator.add(interval("a!f", 10, 15));
    aggregator.add(interval("a!g", 2, 4));

    expect(aggregator.get("a!f")).toEqual({
      functionId: "a!f",
      count: 2,
      mean: 3,
      min: 1,
      max: 5,
      sampleStdDev: Math.sqrt(8),
    });
    expect(aggregator.get("a!g")?.count).toBe(1);
    expect(aggregator.get("a!g")?.sampleStdDev).toBe(0);
  });

  it("returns undefined for a function with no intervals", () => {
    expect(aggregator.get("a!missing")).toBeUndefined();
    aggregator.observe("a!seen");
    expect(aggregator.get("a!seen")).toBeUndefined();
  });

  it("snapshot is sorted by function id and skips unmeasured functions", () => {
    aggregator.add(interval("libz!b", 0, 1));
    aggregator.observe("libz!a");
    aggregator.add(interval("liba!z", 0, 1));
    aggregator.add(interval("libz!c", 0, 1));

    expect(aggregator.snapshot().map((s) => s.functionId)).toEqual(["liba!z", "libz!b", "libz!c"]);
    expect(aggregator.unmeasured()).toEqual(["libz!a"]);
  });

  it("snapshot does not change the aggregate", () => {
    aggregator.add(interval("a!f", 0, 2));
    const first = aggregator.snapshot();
    const second = aggregator.snapshot();
    expect(second).toEqual(first);
  });

  it("observing a measured function does not reset it", () => {
    aggregator.add(interval("a!f", 0, 2));
    aggregator.observe("a!f");
    expect(aggregator.countOf("a!f")).toBe(1);
    expect(aggregator.unmeasured()).toEqual([]);
  });

  it("gives the same result whatever order intervals arrive in", () => {
    const intervals = [interval("a!f", 0, 1), interval("a!f", 0, 4), interval("a!f", 0, 2), interval("a!f", 0, 9)];

    intervals.forEach((i) => aggregator.add(i));
    const reversed = new StatisticsAggregator();
    [...intervals].reverse().forEach((i) => reversed.add(i));

    const a = aggregator.get("a!f");
    const b = reversed.get("a!f");
    expect(a?.count).toBe(b?.count);
    expect(a?.min).toBe(b?.min);
    expect(a?.max).toBe(b?.max);
    expect(a?.mean).toBeCloseTo(b?.mean ?? NaN, 12);
    expect(a?.sampleStdDev).toBeCloseTo(b?.sampleStdDev ?? NaN, 12);
  });

  it("gives identical statistics for the same intervals fed twice", () => {
    const intervals = [
      interval("a!f", 0, 0.3),
      interval("a!g", 1, 1.7, 2),
      interval("a!f", 2, 2.1),
      interval("a!f", 3, 3.9, 2),
      interval("a!g", 4, 4.05),
    ];

    const first = new StatisticsAggregator();
    const second = new StatisticsAggregator();
    intervals.forEach((i) => first.add(i));
    intervals.forEach((i) => second.add(i));

    expect(second.snapshot()).toEqual(first.snapshot());
    expect(first.snapshot().map((s) => s.count)).toEqual([3, 2]);
  });

  it("rejects an interval that ends before it starts", () => {
    const bad: CallInterval = { ...interval("a!f", 5, 3), duration: -2 };

    expect(aggregator.add(bad)).toBe(false);
    expect(aggregator.countOf("a!f")).toBe(0);
    expect(sink.counts().negative_duration).toBe(1);
    expect(sink.diagnostics()[0].message).toBe(
      "Rejecting interval of a!f in context 1: end 3 precedes start 5"
    );
    expect(sink.diagnostics()[0].id).toBe("aggregator-0");
  });

  it("rejects a non-finite duration", () => {
    const bad: CallInterval = { ...interval("a!f", 0, 1), duration: NaN };
    expect(aggregator.add(bad)).toBe(false);
    expect(aggregator.get("a!f")).toBeUndefined();
  });

  it("works without a diagnostic sink", () => {
    const quiet = new StatisticsAggregator();
    expect(quiet.add(interval("a!f", 5, 3))).toBe(false);
  });

  it("merges another aggregator's statistics", () => {
    aggregator.add(interval("a!f", 0, 1));
    const other = new StatisticsAggregator();
    other.add(interval("a!f", 0, 5));
    other.add(interval("a!g", 0, 2));
    other.observe("a!h");

    aggregator.merge(other);

    expect(aggregator.get("a!f")?.mean).toBe(3);
    expect(aggregator.get("a!f")?.count).toBe(2);
    expect(aggregator.get("a!g")?.count).toBe(1);
    expect(aggregator.unmeasured()).toEqual(["a!h"]);
  });

  it("reset forgets every function", () => {
    aggregator.add(interval("a!f", 0, 1));
    aggregator.reset();
    expect(aggregator.snapshot()).toEqual([]);
    expect(aggregator.unmeasured()).toEqual([]);
  });
});
