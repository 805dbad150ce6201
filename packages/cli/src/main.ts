/**
 * calltime command-line driver.
 *
 * Wires a trace source, an adapter and a LatencyPipeline together, prints the
 * report on stdout and the trace-quality summary on stderr.
 *
 * Exit codes: 0 report written, 1 trace could not be read, 2 usage error.
 */

import type { Readable } from "node:stream";

import type { IRawTraceAdapter, IReportFormatter } from "@calltime/contracts";
import {
  FileTraceSource,
  JsonLinesAdapter,
  PerfScriptAdapter,
  StreamTraceSource,
  type TraceSource,
} from "@calltime/adapters";
import {
  JsonReportFormatter,
  LatencyPipeline,
  TextReportFormatter,
  type LatencyRunResult,
} from "@calltime/engine";

import { CliUsageError, USAGE, parseCliArgs, type CliOptions } from "./args";
import { formatSummary } from "./summary";

/**
 * Where the CLI reads and writes. Injected so tests can run it in process.
 */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  stdin: Readable;
}

const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
  stdin: process.stdin,
};

export async function main(argv: string[], io: CliIO = processIO): Promise<number> {
  let options: CliOptions;
  try {
    const command = parseCliArgs(argv);
    if (command.kind === "help") {
      io.out(USAGE);
      return 0;
    }
    options = command.options;
  } catch (err) {
    if (err instanceof CliUsageError) {
      io.err(`calltime: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  const traceSource: TraceSource =
    options.trace === "-"
      ? new StreamTraceSource(io.stdin, "stdin")
      : new FileTraceSource(options.trace);

  const pipeline = new LatencyPipeline({
    maxSkew: options.maxSkew,
    maxBufferedEvents: options.maxBuffered,
    mismatchPolicy: options.mismatch,
    echoDiagnostics: options.verbose,
  });

  let result: LatencyRunResult;
  try {
    result = await pipeline.analyze(createAdapter(options, traceSource));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    io.err(`calltime: cannot read trace ${traceSource.name}: ${reason}\n`);
    return 1;
  }

  io.out(createFormatter(options).format(result.report));
  io.err(formatSummary(result.report));
  return 0;
}

function createAdapter(options: CliOptions, traceSource: TraceSource): IRawTraceAdapter {
  if (options.format === "jsonl") {
    return new JsonLinesAdapter(traceSource, { unit: options.unit ?? "ns" });
  }
  return new PerfScriptAdapter(traceSource, { contextKey: options.context });
}

function createFormatter(options: CliOptions): IReportFormatter {
  if (options.output === "json") {
    return new JsonReportFormatter();
  }
  return new TextReportFormatter({ precision: options.precision });
}
