#!/usr/bin/env node
/**
 * clite - command-line front end
 */
import { createProgram, COMMAND_NAMES } from "./program.js";

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !COMMAND_NAMES.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

const program = createProgram({
  onExit: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
