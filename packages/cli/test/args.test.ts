import { describe, it, expect } from "vitest";
import { CliUsageError, parseCliArgs } from "../src/args";

function options(argv: string[]) {
  const command = parseCliArgs(argv);
  if (command.kind !== "analyze") throw new Error(`expected analyze, got ${command.kind}`);
  return command.options;
}

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    expect(options(["trace.txt"])).toEqual({
      trace: "trace.txt",
      format: "perf",
      unit: undefined,
      maxSkew: 0,
      maxBuffered: 100000,
      mismatch: "unwind",
      context: "tid",
      output: "text",
      precision: 6,
      verbose: false,
    });
  });

  it("reads every option", () => {
    expect(
      options([
        "--format", "jsonl",
        "--unit", "us",
        "--max-skew", "2.5",
        "--max-buffered", "64",
        "--mismatch", "search",
        "--context", "pid",
        "--output", "json",
        "--precision", "3",
        "--verbose",
        "-",
      ])
    ).toEqual({
      trace: "-",
      format: "jsonl",
      unit: "us",
      maxSkew: 2.5,
      maxBuffered: 64,
      mismatch: "search",
      context: "pid",
      output: "json",
      precision: 3,
      verbose: true,
    });
  });

  it("recognises help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseCliArgs(["-h", "trace.txt"])).toEqual({ kind: "help" });
  });

  it("requires exactly one trace file", () => {
    expect(() => parseCliArgs([])).toThrow(new CliUsageError("Missing trace file"));
    expect(() => parseCliArgs(["a.txt", "b.txt"])).toThrow("Expected one trace file, got 2");
  });

  it("names the offending flag", () => {
    expect(() => parseCliArgs(["--max-skew=-1", "t.txt"])).toThrow(/^Invalid --max-skew: /);
    expect(() => parseCliArgs(["--max-buffered", "ten", "t.txt"])).toThrow(/^Invalid --max-buffered: /);
    expect(() => parseCliArgs(["--format", "xml", "t.txt"])).toThrow(/^Invalid --format: /);
    expect(() => parseCliArgs(["--precision", "30", "t.txt"])).toThrow(/^Invalid --precision: /);
  });

  it("only takes --unit for jsonl traces", () => {
    expect(() => parseCliArgs(["--unit", "ms", "t.txt"])).toThrow(
      "Invalid --unit: --unit only applies to --format jsonl"
    );
  });

  it("turns unknown options into usage errors", () => {
    expect(() => parseCliArgs(["--bogus", "t.txt"])).toThrow(CliUsageError);
  });
});
