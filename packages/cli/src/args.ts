import { parseArgs } from "node:util";
import { z } from "zod";

export const USAGE = `Usage: calltime [options] <trace-file | ->

Per-function latency from a trace of function entry/return probes.
Reads the trace from <trace-file>, or from stdin when given "-".

Options:
  --format <perf|jsonl>      trace format (default: perf)
  --unit <s|ms|us|ns>        timestamp unit of a jsonl trace (default: ns)
  --max-skew <n>             allowed clock skew between records, in trace units (default: 0)
  --max-buffered <n>         reorder buffer capacity in events (default: 100000)
  --mismatch <unwind|search> recovery when an exit does not match its stack (default: unwind)
  --context <tid|pid>        execution context of a perf trace (default: tid)
  --output <text|json>       report format (default: text)
  --precision <n>            significant digits in the text report (default: 6)
  --verbose                  print every diagnostic to stderr
  -h, --help                 show this help
`;

/**
 * Bad command line. Reported with the usage text.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const CliOptionsSchema = z
  .object({
    trace: z.string().min(1),
    format: z.enum(["perf", "jsonl"]),
    unit: z.enum(["s", "ms", "us", "ns"]).optional(),
    maxSkew: z.coerce.number().finite().nonnegative(),
    maxBuffered: z.coerce.number().int().positive(),
    mismatch: z.enum(["unwind", "search"]),
    context: z.enum(["tid", "pid"]),
    output: z.enum(["text", "json"]),
    precision: z.coerce.number().int().min(1).max(21),
    verbose: z.boolean(),
  })
  .refine((o) => o.unit === undefined || o.format === "jsonl", {
    message: "--unit only applies to --format jsonl",
    path: ["unit"],
  });

export type CliOptions = z.output<typeof CliOptionsSchema>;

export type CliCommand =
  | { kind: "help" }
  | { kind: "analyze"; options: CliOptions };

const FLAG_NAMES: Record<string, string> = {
  maxSkew: "--max-skew",
  maxBuffered: "--max-buffered",
  trace: "<trace-file>",
};

/**
 * Parse and validate command-line arguments (without the node and script
 * entries). Throws CliUsageError on anything invalid.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: "help" };

  if (positionals.length !== 1) {
    throw new CliUsageError(
      positionals.length === 0
        ? "Missing trace file"
        : `Expected one trace file, got ${positionals.length}`
    );
  }

  const result = CliOptionsSchema.safeParse({
    trace: positionals[0],
    format: values.format,
    unit: values.unit,
    maxSkew: values["max-skew"],
    maxBuffered: values["max-buffered"],
    mismatch: values.mismatch,
    context: values.context,
    output: values.output,
    precision: values.precision,
    verbose: values.verbose,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path[0];
    const flag =
      typeof key === "string" ? FLAG_NAMES[key] ?? `--${key}` : "arguments";
    throw new CliUsageError(`Invalid ${flag}: ${issue?.message ?? "invalid value"}`);
  }

  return { kind: "analyze", options: result.data };
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      format: { type: "string", default: "perf" },
      unit: { type: "string" },
      "max-skew": { type: "string", default: "0" },
      "max-buffered": { type: "string", default: "100000" },
      mismatch: { type: "string", default: "unwind" },
      context: { type: "string", default: "tid" },
      output: { type: "string", default: "text" },
      precision: { type: "string", default: "6" },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}
