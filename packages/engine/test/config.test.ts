import { describe, it, expect } from "vitest";
import { DEFAULT_PIPELINE_CONFIG, resolvePipelineConfig } from "../src/config";

describe("resolvePipelineConfig", () => {
  it("fills in defaults", () => {
    expect(resolvePipelineConfig()).toEqual({
      maxSkew: 0,
      maxBufferedEvents: 100_000,
      mismatchPolicy: "unwind",
      echoDiagnostics: false,
      retainDiagnostics: 1000,
    });
    expect(DEFAULT_PIPELINE_CONFIG).toEqual(resolvePipelineConfig({}));
  });

  it("keeps given values", () => {
    const config = resolvePipelineConfig({ maxSkew: 0.5, mismatchPolicy: "search" });
    expect(config.maxSkew).toBe(0.5);
    expect(config.mismatchPolicy).toBe("search");
    expect(config.maxBufferedEvents).toBe(100_000);
  });

  it("rejects invalid values", () => {
    expect(() => resolvePipelineConfig({ maxSkew: -1 })).toThrow();
    expect(() => resolvePipelineConfig({ maxSkew: Infinity })).toThrow();
    expect(() => resolvePipelineConfig({ maxBufferedEvents: 0 })).toThrow();
    expect(() => resolvePipelineConfig({ maxBufferedEvents: 1.5 })).toThrow();
  });
});
