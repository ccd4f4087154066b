/**
 * @sublisp/cli - command entry points
 */
export { runCheck } from "./cmd-check.js";
export { runRun } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runBuild } from "./cmd-build.js";
export { runTrace, summarize } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { runHelp } from "./cmd-help.js";
export { resolveConfig, ConfigError, configSchema, DEFAULT_CONFIG, BINDINGS } from "./config.js";
export type { Binding, Config, ConfigSource, ResolvedConfig } from "./config.js";
