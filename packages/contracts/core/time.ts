/**
 * Trace time.
 *
 * Timestamps are monotonic instants in the unit declared by the source
 * adapter. Durations and every statistic derived from them stay in that unit.
 */

export type Timestamp = number;
export type Duration = number;

export type TimeUnit = "s" | "ms" | "us" | "ns";

export const TIME_UNIT_NAMES: Record<TimeUnit, string> = {
  s: "seconds",
  ms: "milliseconds",
  us: "microseconds",
  ns: "nanoseconds",
};
