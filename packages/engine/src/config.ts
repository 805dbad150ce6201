import { z } from "zod";

/**
 * Pipeline configuration. Every field is optional; omitted fields take the
 * defaults below.
 */
export const LatencyPipelineConfigSchema = z.object({
  /** Largest expected clock skew between records, in trace time units */
  maxSkew: z.number().finite().nonnegative().default(0),

  /** Upper bound on events held in the reorder buffer */
  maxBufferedEvents: z.number().int().positive().default(100_000),

  /** How the correlator recovers from an exit that does not match its stack */
  mismatchPolicy: z.enum(["unwind", "search"]).default("unwind"),

  /** Echo every diagnostic to the console as it is raised */
  echoDiagnostics: z.boolean().default(false),

  /** How many individual diagnostics a run keeps (counts are always kept) */
  retainDiagnostics: z.number().int().nonnegative().default(1000),
});

export type LatencyPipelineConfig = z.input<typeof LatencyPipelineConfigSchema>;
export type ResolvedLatencyPipelineConfig = z.output<typeof LatencyPipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: ResolvedLatencyPipelineConfig =
  LatencyPipelineConfigSchema.parse({});

/**
 * Apply defaults and validate. Throws a ZodError on invalid values.
 */
export function resolvePipelineConfig(
  config: LatencyPipelineConfig = {}
): ResolvedLatencyPipelineConfig {
  return LatencyPipelineConfigSchema.parse(config);
}
