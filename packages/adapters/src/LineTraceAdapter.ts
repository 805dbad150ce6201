/**
 * Line Trace Adapter
 *
 * Base for adapters whose trace is text with one probe crossing per line.
 * Pulls lines from a TraceSource and hands them out as RawRecordFrames of
 * at most `batchSize` records. Subclasses only decide how a line maps to
 * record fields.
 */

import type {
  IRawTraceAdapter,
  RawProbeRecord,
  RawRecordFrame,
  SourceId,
  StreamId,
  TimeUnit,
} from "@calltime/contracts";

import type { TraceSource } from "./trace/TraceSource";

/**
 * Configuration shared by line-based adapters.
 */
export interface LineTraceAdapterConfig {
  /**
   * Source identifier for provenance.
   */
  sourceId?: SourceId;

  /**
   * Stream identifier for provenance.
   * @default the trace source's name
   */
  streamId?: StreamId;

  /**
   * Maximum records per frame.
   * @default 512
   */
  batchSize?: number;
}

export abstract class LineTraceAdapter implements IRawTraceAdapter {
  readonly source: SourceId;
  readonly stream: StreamId;
  abstract readonly unit: TimeUnit;

  protected traceSource: TraceSource;
  private batchSize: number;
  private lines: AsyncIterableIterator<string> | null = null;
  private lineNumber = 0;
  private exhausted = false;

  constructor(traceSource: TraceSource, sourceId: SourceId, config: LineTraceAdapterConfig = {}) {
    this.traceSource = traceSource;
    this.source = config.sourceId ?? sourceId;
    this.stream = config.streamId ?? traceSource.name;
    this.batchSize = config.batchSize ?? 512;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new Error(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
  }

  async nextFrame(): Promise<RawRecordFrame | null> {
    if (this.exhausted) return null;

    const lines = await this.openLines();
    const records: RawProbeRecord[] = [];

    while (records.length < this.batchSize) {
      const next = await lines.next();
      if (next.done) {
        this.exhausted = true;
        break;
      }

      this.lineNumber++;
      const fields = this.parseLine(next.value);
      if (fields === null) continue;

      records.push({ seq: this.lineNumber, fields, text: next.value });
    }

    if (records.length === 0) return null;

    return {
      source: this.source,
      stream: this.stream,
      records,
    };
  }

  async close(): Promise<void> {
    this.exhausted = true;
    if (this.lines) {
      await this.lines.return?.();
      this.lines = null;
    }
    await this.traceSource.close();
  }

  /**
   * Map one line to record fields.
   * @returns null for lines that carry no record (blank lines, comments)
   */
  protected abstract parseLine(line: string): Record<string, unknown> | null;

  private async openLines(): Promise<AsyncIterableIterator<string>> {
    if (!this.lines) {
      await this.traceSource.open();
      this.lines = this.traceSource.lines();
    }
    return this.lines;
  }
}
