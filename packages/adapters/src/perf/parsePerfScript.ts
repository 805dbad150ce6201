/**
 * Parsing of `perf script` output for uprobe/uretprobe events.
 *
 * Default text layout, one event per line:
 *
 *   <comm> <pid>[/<tid>] [<cpu>] <secs>.<frac>: [<period>] <event>: <details>
 *
 * Probe events are named `probe_<lib>:<func>` for entries and
 * `probe_<lib>:<func>__return` for returns. Probes added as
 * `<func>_ret=<func>%return` end in `_ret` instead, and scripted perf joins
 * group and event with `__` (`probe_<lib>__<func>`); both are accepted.
 */

import type { ProbeKind, Timestamp } from "@calltime/contracts";
import { createFunctionId } from "@calltime/contracts";

export type ContextKey = "tid" | "pid";

export interface ProbeEventName {
  library: string;
  symbol: string;
  kind: ProbeKind;
}

const PERF_LINE =
  /^\s*(.*?)\s+(\d+)(?:\/(\d+))?\s+(?:\[\d+\]\s+)?(\d+)\.(\d+):\s+(?:\d+\s+)?(\S+?):(?:\s|$)/;

const PROBE_GROUP_PREFIX = "probe_";

const RETURN_SUFFIXES = ["__return", "_ret"] as const;

/**
 * Split a perf probe event name into library, symbol and direction.
 * Returns null for events that are not probe events.
 */
export function parseProbeEventName(name: string): ProbeEventName | null {
  let rest = name;
  let kind: ProbeKind = "entry";

  for (const suffix of RETURN_SUFFIXES) {
    if (rest.length > suffix.length && rest.endsWith(suffix)) {
      rest = rest.slice(0, -suffix.length);
      kind = "exit";
      break;
    }
  }

  let group: string;
  let event: string;
  const colon = rest.indexOf(":");
  if (colon >= 0) {
    group = rest.slice(0, colon);
    event = rest.slice(colon + 1);
  } else {
    const sep = rest.lastIndexOf("__");
    if (sep < 0) return null;
    group = rest.slice(0, sep);
    event = rest.slice(sep + 2);
  }

  if (!group.startsWith(PROBE_GROUP_PREFIX)) return null;
  const library = group.slice(PROBE_GROUP_PREFIX.length);
  if (library.length === 0 || event.length === 0 || event.includes(":")) return null;

  return { library, symbol: event, kind };
}

/**
 * `secs.frac` as seconds, keeping every printed digit of the fraction.
 */
export function parsePerfTimestamp(secs: string, frac: string): Timestamp {
  return Number(secs) + Number(frac) / 10 ** frac.length;
}

/**
 * Extract record fields from one line of `perf script` output.
 *
 * @returns null for blank and comment lines; otherwise whatever fields could
 *   be extracted (an empty object when the line is not an event line)
 */
export function parsePerfScriptLine(
  line: string,
  contextKey: ContextKey = "tid"
): Record<string, unknown> | null {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) return null;

  const match = PERF_LINE.exec(line);
  if (!match) return {};

  const [, , first, second, secs, frac, eventName] = match;
  // A lone number is the tid; "pid/tid" carries both
  const pid = Number(first);
  const tid = second !== undefined ? Number(second) : pid;

  const fields: Record<string, unknown> = {
    executionContext: contextKey === "tid" ? tid : pid,
    timestamp: parsePerfTimestamp(secs, frac),
  };

  const probe = parseProbeEventName(eventName);
  if (probe) {
    fields.functionId = createFunctionId(probe.library, probe.symbol);
    fields.kind = probe.kind;
  }

  return fields;
}
