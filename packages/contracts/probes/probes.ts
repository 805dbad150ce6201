/**
 * Probe Events and Call Intervals
 *
 * Canonical, validated events produced by the normalizer, and the matched
 * entry/exit pairs produced by the correlator.
 */

import type { Duration, Timestamp } from "../core/time";

/**
 * Stable `library!symbol` identifier of a probed function.
 */
export type FunctionId = string;

/**
 * Thread or process id distinguishing independent call stacks.
 */
export type ExecutionContextId = number;

export type ProbeKind = "entry" | "exit";

export const FUNCTION_ID_SEPARATOR = "!";

export interface ProbeEvent {
  readonly timestamp: Timestamp;
  readonly functionId: FunctionId;
  readonly executionContext: ExecutionContextId;
  readonly kind: ProbeKind;
  /** Arrival position in the source; breaks timestamp ties */
  readonly seq: number;
}

/**
 * One concrete invocation: a matched entry/exit pair.
 * Invariant: endTime >= startTime.
 */
export interface CallInterval {
  readonly functionId: FunctionId;
  readonly executionContext: ExecutionContextId;
  readonly startTime: Timestamp;
  readonly endTime: Timestamp;
  readonly duration: Duration;
  /** Recursion depth of this function in its context at entry (1 = outermost) */
  readonly depth: number;
}

export function createFunctionId(library: string, symbol: string): FunctionId {
  return `${library}${FUNCTION_ID_SEPARATOR}${symbol}`;
}

/**
 * Split a FunctionId into its parts. Returns null when the id is not of the
 * form `library!symbol`.
 */
export function parseFunctionId(
  id: FunctionId
): { library: string; symbol: string } | null {
  const idx = id.indexOf(FUNCTION_ID_SEPARATOR);
  if (idx <= 0 || idx === id.length - 1) return null;
  if (id.indexOf(FUNCTION_ID_SEPARATOR, idx + 1) !== -1) return null;
  return { library: id.slice(0, idx), symbol: id.slice(idx + 1) };
}
