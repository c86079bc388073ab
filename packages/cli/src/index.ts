/**
 * @tally/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runFmt } from "./cmd-fmt.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { resolveConfig, ConfigError, configFileSchema } from "./config.js";
export type { TallyConfig, ResolvedConfig } from "./config.js";
export { parseProgram, parseJsonProgram } from "./program-file.js";
export type { LoadResult } from "./program-file.js";
