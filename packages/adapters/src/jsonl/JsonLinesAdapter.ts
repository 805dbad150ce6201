/**
 * JSON Lines Adapter
 *
 * One JSON object per line carrying the record fields directly:
 *
 *   {"functionId":"libm!sin","executionContext":4242,"kind":"entry","timestamp":1200}
 *
 * Lines that are not JSON objects become empty records, which the normalizer
 * counts as malformed.
 */

import type { TimeUnit } from "@calltime/contracts";

import { LineTraceAdapter, type LineTraceAdapterConfig } from "../LineTraceAdapter";
import type { TraceSource } from "../trace/TraceSource";

/**
 * Configuration for the JsonLinesAdapter.
 */
export interface JsonLinesAdapterConfig extends LineTraceAdapterConfig {
  /**
   * Unit of the `timestamp` field.
   * @default "ns"
   */
  unit?: TimeUnit;
}

export class JsonLinesAdapter extends LineTraceAdapter {
  readonly unit: TimeUnit;

  constructor(traceSource: TraceSource, config: JsonLinesAdapterConfig = {}) {
    super(traceSource, "jsonl", config);
    this.unit = config.unit ?? "ns";
  }

  protected parseLine(line: string): Record<string, unknown> | null {
    if (line.trim().length === 0) return null;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      return {};
    }

    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return {};
    }
    return Object.fromEntries(Object.entries(value));
  }
}
