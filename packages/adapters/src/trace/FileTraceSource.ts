import { createReadStream, type ReadStream } from "node:fs";

import type { TraceSource } from "./TraceSource";
import { readLines } from "./readLines";

/**
 * TraceSource reading a trace file from disk.
 */
export class FileTraceSource implements TraceSource {
  readonly name: string;
  private path: string;
  private stream: ReadStream | null = null;

  constructor(path: string) {
    this.path = path;
    this.name = path;
  }

  /**
   * Open the file. A missing or unreadable file rejects with the fs error
   * (ENOENT, EACCES, ...) unchanged.
   */
  async open(): Promise<void> {
    if (this.stream) return;

    const stream = createReadStream(this.path, { encoding: "utf8" });
    await new Promise<void>((resolve, reject) => {
      stream.once("open", () => resolve());
      stream.once("error", reject);
    });
    this.stream = stream;
  }

  lines(): AsyncIterableIterator<string> {
    if (!this.stream) {
      throw new Error(`FileTraceSource not opened: ${this.path}`);
    }
    return readLines(this.stream);
  }

  async close(): Promise<void> {
    if (this.stream) {
      this.stream.destroy();
      this.stream = null;
    }
  }
}
