import type { Readable } from "node:stream";

import type { TraceSource } from "./TraceSource";
import { readLines } from "./readLines";

/**
 * TraceSource over an already-open stream, such as process.stdin.
 */
export class StreamTraceSource implements TraceSource {
  readonly name: string;
  private input: Readable;

  constructor(input: Readable, name = "stream") {
    this.input = input;
    this.name = name;
  }

  async open(): Promise<void> {
    // Already open
  }

  lines(): AsyncIterableIterator<string> {
    return readLines(this.input);
  }

  async close(): Promise<void> {
    this.input.destroy();
  }
}
