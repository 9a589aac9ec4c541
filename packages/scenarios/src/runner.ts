/**
 * Runs one CLI invocation in process and captures what it prints.
 */
import { CommanderError } from "commander";
import { createProgram } from "@clite/cli";

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Console output is captured line by line; usage errors raised by commander
 * become their exit code, as they would for the installed binary.
 */
export async function runCli(args: string[], workDir: string, homeDir: string): Promise<CliResult> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...parts: unknown[]) => out.push(parts.map(String).join(" ") + "\n");
  console.error = (...parts: unknown[]) => err.push(parts.map(String).join(" ") + "\n");

  let exitCode = 0;
  try {
    const program = createProgram({
      cwd: workDir,
      homeDir,
      exitOverride: true,
      onExit: (code) => {
        exitCode = code;
      },
    });
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e;
    exitCode = e.exitCode;
  } finally {
    console.log = origLog;
    console.error = origError;
  }

  return { exitCode, stdout: out.join(""), stderr: err.join("") };
}
