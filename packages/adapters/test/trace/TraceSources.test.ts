import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { Readable } from "node:stream";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { StreamTraceSource } from "../../src/trace/StreamTraceSource";
import { FileTraceSource } from "../../src/trace/FileTraceSource";
import type { TraceSource } from "../../src/trace/TraceSource";

async function collect(source: TraceSource): Promise<string[]> {
  await source.open();
  const lines: string[] = [];
  for await (const line of source.lines()) {
    lines.push(line);
  }
  await source.close();
  return lines;
}

describe("StreamTraceSource", () => {
  it("splits a stream into lines", async () => {
    const source = new StreamTraceSource(Readable.from(["first\nsec", "ond\r\nthird"]), "stdin");

    expect(source.name).toBe("stdin");
    expect(await collect(source)).toEqual(["first", "second", "third"]);
  });

  it("passes a stream error through", async () => {
    const input = new Readable({
      read() {
        this.destroy(new Error("pipe broke"));
      },
    });
    const source = new StreamTraceSource(input);

    await expect(collect(source)).rejects.toThrow("pipe broke");
  });
});

describe("FileTraceSource", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "calltime-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the lines of a file", async () => {
    const path = join(dir, "trace.txt");
    await writeFile(path, "a\nb\n\nc\n");

    const source = new FileTraceSource(path);

    expect(source.name).toBe(path);
    expect(await collect(source)).toEqual(["a", "b", "", "c"]);
  });

  it("rejects open for a missing file", async () => {
    const source = new FileTraceSource(join(dir, "missing.txt"));
    await expect(source.open()).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("refuses to read before it is opened", () => {
    const source = new FileTraceSource(join(dir, "trace.txt"));
    expect(() => source.lines()).toThrow("FileTraceSource not opened");
  });
});
