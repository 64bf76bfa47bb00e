/**
 * @minasm/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun, parseBindings } from "./cmd-run.js";
export type { RunOpts } from "./cmd-run.js";
export { runFmt } from "./cmd-fmt.js";
export type { FmtOpts } from "./cmd-fmt.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export type { TraceSummary, TraceOutcome } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
