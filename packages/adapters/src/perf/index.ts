export { PerfScriptAdapter, type PerfScriptAdapterConfig } from "./PerfScriptAdapter";
export {
  parsePerfScriptLine,
  parseProbeEventName,
  parsePerfTimestamp,
  type ContextKey,
  type ProbeEventName,
} from "./parsePerfScript";
