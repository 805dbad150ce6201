import { describe, it, expect } from "vitest";
import { JsonLinesAdapter } from "../../src/jsonl/JsonLinesAdapter";
import { MockTraceSource } from "../MockTraceSource";

describe("JsonLinesAdapter", () => {
  it("passes object fields through", async () => {
    const line = '{"functionId":"libm!sin","executionContext":1,"kind":"entry","timestamp":100}';
    const adapter = new JsonLinesAdapter(new MockTraceSource([line]));

    const frame = await adapter.nextFrame();

    expect(frame).toEqual({
      source: "jsonl",
      stream: "mock.trace",
      records: [
        {
          seq: 1,
          fields: { functionId: "libm!sin", executionContext: 1, kind: "entry", timestamp: 100 },
          text: line,
        },
      ],
    });
  });

  it("turns lines that are not JSON objects into empty records", async () => {
    const adapter = new JsonLinesAdapter(new MockTraceSource(["not json", "[1,2]", "", "42", "null"]));

    const frame = await adapter.nextFrame();

    expect(frame?.records.map((r) => [r.seq, r.fields])).toEqual([
      [1, {}],
      [2, {}],
      [4, {}],
      [5, {}],
    ]);
  });

  it("defaults to nanoseconds", () => {
    expect(new JsonLinesAdapter(new MockTraceSource([])).unit).toBe("ns");
    expect(new JsonLinesAdapter(new MockTraceSource([]), { unit: "us" }).unit).toBe("us");
  });

  it("returns null for an empty trace", async () => {
    expect(await new JsonLinesAdapter(new MockTraceSource([])).nextFrame()).toBeNull();
  });
});
