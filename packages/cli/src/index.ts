export { main, type CliIO } from "./main";
export { parseCliArgs, CliUsageError, USAGE, type CliOptions, type CliCommand } from "./args";
export { formatSummary } from "./summary";
