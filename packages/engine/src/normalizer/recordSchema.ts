import { z } from "zod";

/**
 * Shape a raw record's fields must have to become a ProbeEvent.
 */
export const ProbeRecordSchema = z.object({
  functionId: z
    .string()
    .regex(/^[^!\s]+![^!\s]+$/, "expected library!symbol"),
  executionContext: z.number().int().nonnegative(),
  kind: z.enum(["entry", "exit"]),
  timestamp: z
    .number()
    .finite()
    .refine(
      (t) => Math.abs(t) <= Number.MAX_SAFE_INTEGER,
      "outside the exactly representable range (|t| <= 2^53 - 1)"
    ),
});

/**
 * One-line summary of why a record failed validation.
 */
export function describeRecordError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid record";
  const path = issue.path.length > 0 ? issue.path.join(".") : "record";
  return `${path}: ${issue.message}`;
}
