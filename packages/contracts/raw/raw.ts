/**
 * Raw Record Types
 *
 * What a source adapter can observe before validation: one record per probe
 * crossing, with whatever fields the adapter managed to extract. The
 * normalizer decides whether a record is usable.
 */

import type { SourceId, StreamId } from "../core/provenance";

/**
 * One probe crossing as emitted by an adapter.
 *
 * `fields` is expected to carry `functionId`, `executionContext`, `kind` and
 * `timestamp`, but nothing is guaranteed until the normalizer validates it.
 */
export interface RawProbeRecord {
  /** Position of the record in its source (line number for text sources) */
  seq: number;
  fields: Readonly<Record<string, unknown>>;
  /** Original text, kept for diagnostics */
  text?: string;
}

/**
 * Batch of raw records pulled from an adapter in one call.
 */
export interface RawRecordFrame {
  source: SourceId;
  stream: StreamId;
  records: RawProbeRecord[];
}
