/**
 * @clite/cli - CLI entry point re-exports
 */
export { createProgram, COMMAND_NAMES } from "./program.js";
export type { ProgramOptions } from "./program.js";
export { runRun } from "./cmd-run.js";
export type { RunCommandOptions } from "./cmd-run.js";
export { runLint } from "./cmd-lint.js";
export type { LintCommandOptions } from "./cmd-lint.js";
export { runCheck } from "./cmd-check.js";
export { runTrace } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export type { CommandEnv } from "./output.js";
