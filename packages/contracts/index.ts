export * from "./core/time";
export * from "./core/provenance";

// Raw record types (adapter output)
export * from "./raw/raw";

// Canonical events and intervals
export * from "./probes/probes";

export * from "./stats/stats";

export * from "./diagnostics/diagnostics";

export * from "./pipeline/interfaces";
