/**
 * Event Stream Normalizer
 *
 * Turns RawRecordFrames into canonical ProbeEvents in strict time order.
 * Records are validated against ProbeRecordSchema, then held in a bounded
 * reorder buffer until no in-skew record can still precede them.
 */

import type {
  IEventNormalizer,
  IDiagnosticSink,
  ProbeEvent,
  RawProbeRecord,
  RawRecordFrame,
  Duration,
  Timestamp,
} from "@calltime/contracts";

import { MinHeap } from "../utils/MinHeap";
import { ProbeRecordSchema, describeRecordError } from "./recordSchema";

/**
 * Configuration for the EventStreamNormalizer.
 */
export interface EventStreamNormalizerConfig {
  /**
   * Largest expected clock skew between records, in trace time units.
   * A record may arrive up to this much later than a record with a larger
   * timestamp and still be put in order.
   * @default 0
   */
  maxSkew?: Duration;

  /**
   * Upper bound on buffered events. Beyond it the oldest events are
   * released early.
   * @default 100000
   */
  maxBufferedEvents?: number;
}

const DEFAULT_CONFIG: Required<EventStreamNormalizerConfig> = {
  maxSkew: 0,
  maxBufferedEvents: 100_000,
};

export class EventStreamNormalizer implements IEventNormalizer {
  readonly id = "normalizer";

  private config: Required<EventStreamNormalizerConfig>;
  private sink: IDiagnosticSink;
  private buffer: MinHeap<ProbeEvent> = new MinHeap();
  private arrival = 0;
  private diagnosticCount = 0;

  /** Largest timestamp accepted so far */
  private maxSeen: Timestamp | null = null;

  /** Timestamp of the most recently released event */
  private lastReleased: Timestamp | null = null;

  constructor(sink: IDiagnosticSink, config: EventStreamNormalizerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.sink = sink;

    if (!(this.config.maxSkew >= 0) || !Number.isFinite(this.config.maxSkew)) {
      throw new Error(`maxSkew must be a finite non-negative number, got ${this.config.maxSkew}`);
    }
    if (!Number.isInteger(this.config.maxBufferedEvents) || this.config.maxBufferedEvents < 1) {
      throw new Error(`maxBufferedEvents must be a positive integer, got ${this.config.maxBufferedEvents}`);
    }
  }

  init(): void {
    this.reset();
  }

  dispose(): void {
    this.buffer.clear();
  }

  reset(): void {
    this.buffer.clear();
    this.arrival = 0;
    this.diagnosticCount = 0;
    this.maxSeen = null;
    this.lastReleased = null;
  }

  apply(frame: RawRecordFrame): ProbeEvent[] {
    const released: ProbeEvent[] = [];

    for (const record of frame.records) {
      const event = this.validate(record);
      if (!event) continue;

      if (this.isTooLate(event.timestamp)) {
        this.reportOutOfOrder(event);
        continue;
      }

      this.buffer.push(event, event.timestamp, this.arrival++);
      if (this.maxSeen === null || event.timestamp > this.maxSeen) {
        this.maxSeen = event.timestamp;
      }

      this.releaseReady(released);
    }

    return released;
  }

  flush(): ProbeEvent[] {
    const released: ProbeEvent[] = [];
    while (this.buffer.size > 0) {
      this.releaseOne(released);
    }
    return released;
  }

  /** Events currently held back */
  get buffered(): number {
    return this.buffer.size;
  }

  private validate(record: RawProbeRecord): ProbeEvent | null {
    const parsed = ProbeRecordSchema.safeParse(record.fields);
    if (!parsed.success) {
      const excerpt = record.text !== undefined ? `: ${record.text.trim()}` : "";
      this.sink.report({
        id: `normalizer-${this.diagnosticCount++}`,
        kind: "malformed_record",
        category: "normalizer",
        severity: "warning",
        message: `Skipping malformed record ${record.seq} (${describeRecordError(parsed.error)})${excerpt}`,
        timestamp: null,
        source: "Normalizer",
        seq: record.seq,
      });
      return null;
    }

    return Object.freeze({ ...parsed.data, seq: record.seq });
  }

  private isTooLate(t: Timestamp): boolean {
    if (this.maxSeen !== null && t < this.maxSeen - this.config.maxSkew) return true;
    if (this.lastReleased !== null && t < this.lastReleased) return true;
    return false;
  }

  private releaseReady(out: ProbeEvent[]): void {
    if (this.maxSeen === null) return;
    const horizon = this.maxSeen - this.config.maxSkew;

    let next = this.buffer.peekPriority();
    while (next !== null && next <= horizon) {
      this.releaseOne(out);
      next = this.buffer.peekPriority();
    }

    while (this.buffer.size > this.config.maxBufferedEvents) {
      this.releaseOne(out);
    }
  }

  private releaseOne(out: ProbeEvent[]): void {
    const event = this.buffer.pop();
    if (event === null) return;
    this.lastReleased = event.timestamp;
    out.push(event);
  }

  private reportOutOfOrder(event: ProbeEvent): void {
    const bound = Math.max(
      this.maxSeen === null ? -Infinity : this.maxSeen - this.config.maxSkew,
      this.lastReleased ?? -Infinity
    );
    this.sink.report({
      id: `normalizer-${this.diagnosticCount++}`,
      kind: "out_of_order_event",
      category: "normalizer",
      severity: "warning",
      message: `Skipping ${event.kind} of ${event.functionId} at ${event.timestamp}: older than ${bound}, beyond the allowed skew of ${this.config.maxSkew}`,
      timestamp: event.timestamp,
      source: "Normalizer",
      functionId: event.functionId,
      executionContext: event.executionContext,
      seq: event.seq,
    });
  }
}
