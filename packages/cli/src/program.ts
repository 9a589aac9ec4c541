/**
 * Command table for the clite CLI.
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError } from "commander";
import { runRun } from "./cmd-run.js";
import { runLint } from "./cmd-lint.js";
import { runCheck } from "./cmd-check.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";
import type { CommandEnv } from "./output.js";

const require = createRequire(import.meta.url);
const pkg: unknown = require("../package.json");

function packageVersion(): string {
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const COMMAND_NAMES: ReadonlySet<string> = new Set(["run", "lint", "check", "trace", "config", "help"]);

export interface ProgramOptions extends CommandEnv {
  /** Receives the exit code of the command that ran. */
  onExit: (code: number) => void;
  /** Throw a CommanderError on usage errors instead of exiting the process. */
  exitOverride?: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

export function createProgram(options: ProgramOptions): Command {
  const env: CommandEnv = { cwd: options.cwd, homeDir: options.homeDir };
  const program = new Command();

  // Settings below are inherited by subcommands, so they come first.
  program.configureOutput({
    writeOut: (str) => console.log(str.replace(/\n$/, "")),
    writeErr: (str) => console.error(str.replace(/\n$/, "")),
  });
  if (options.exitOverride) {
    program.exitOverride();
  }

  program
    .name("clite")
    .description("clite: interpreter and linter for a small C-like language")
    .version(packageVersion());

  program
    .command("run")
    .description("Run a clite program")
    .argument("<file>", "clite source file to run (or - for stdin)")
    .option("-e, --entry <name>", "Entry function to call (default: main)")
    .option("--no-entry", "Load the program without calling any function")
    .option("--max-depth <n>", "Call and block nesting limit", parsePositiveInt)
    .option("--trace <path>", "Write JSONL trace to file")
    .option("--json", "JSON error output", false)
    .action(async (file: string, opts: { entry?: string | false; maxDepth?: number; trace?: string; json?: boolean }) => {
      options.onExit(await runRun(file, { ...env, ...opts }));
    });

  program
    .command("lint")
    .description("Report static warnings without running anything")
    .argument("<files...>", "clite source files to lint")
    .option("--fail-on-warn", "Exit with code 1 when any warning is reported")
    .option("--json", "Output as JSON", false)
    .action(async (files: string[], opts: { failOnWarn?: boolean; json?: boolean }) => {
      options.onExit(await runLint(files, { ...env, ...opts }));
    });

  program
    .command("check")
    .description("Lex, parse and load without execution")
    .argument("<file>", "clite source file to check")
    .option("--json", "JSON output", false)
    .action(async (file: string, opts: { json?: boolean }) => {
      options.onExit(await runCheck(file, { ...env, ...opts }));
    });

  program
    .command("trace")
    .description("Display trace summary")
    .argument("<file>", "JSONL trace file")
    .option("--json", "Output as JSON", false)
    .action(async (file: string, opts: { json?: boolean }) => {
      options.onExit(await runTrace(file, { ...env, ...opts }));
    });

  program
    .command("config")
    .description("Display the effective configuration and where it came from")
    .option("--json", "Output as JSON", false)
    .action(async (opts: { json?: boolean }) => {
      options.onExit(await runConfig({ ...env, ...opts }));
    });

  return program;
}
