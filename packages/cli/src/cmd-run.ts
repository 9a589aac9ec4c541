/**
 * clite run - execute clite programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  parse,
  run,
  formatValue,
  formatDiagnostic,
  formatDiagnostics,
  resolveConfig,
  CliteRuntimeError,
  CliteConfigError,
} from "@clite/core";
import type { CliteConfig, TraceEvent } from "@clite/core";
import { emitCliError, errorMessage, readSource, resolvePath } from "./output.js";
import type { CommandEnv } from "./output.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

function jsonlWriter(fd: number): (event: TraceEvent) => void {
  return (event) => {
    try {
      fs.writeSync(fd, JSON.stringify(event) + "\n");
    } catch (e) {
      throw new CliIoError(`Error writing trace file: ${errorMessage(e)}`);
    }
  };
}

export interface RunCommandOptions extends CommandEnv {
  /** Entry function name, or false to load without calling anything. */
  entry?: string | false;
  maxDepth?: number;
  trace?: string;
  json?: boolean;
}

export async function runRun(file: string, opts: RunCommandOptions): Promise<number> {
  const json = !!opts.json;

  let config: CliteConfig;
  try {
    config = resolveConfig(opts.cwd, opts.homeDir).config;
  } catch (e) {
    if (e instanceof CliteConfigError) {
      emitCliError(e.code, e.message, json);
      return 4;
    }
    throw e;
  }

  // Read source
  let source: string;
  try {
    source = file === "-" ? fs.readFileSync(0, "utf-8") : readSource(file, opts);
  } catch (e) {
    emitCliError("E_IO", `Error reading file: ${errorMessage(e)}`, json);
    return 4;
  }

  // Parse
  const parseResult = parse(source, file);
  if (parseResult.diagnostics.length > 0 || !parseResult.program) {
    console.error(formatDiagnostics(parseResult.diagnostics, json));
    return 2;
  }

  // Trace setup
  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(resolvePath(opts.trace, opts), "w");
    } catch (e) {
      emitCliError("E_IO", `Error opening trace file: ${errorMessage(e)}`, json);
      return 4;
    }
  }

  const traceHandler = traceFd !== null ? jsonlWriter(traceFd) : undefined;

  // Execute
  try {
    const result = run(parseResult.program, {
      entry: opts.entry === false ? undefined : (opts.entry ?? config.entry),
      callEntry: opts.entry !== false,
      maxDepth: opts.maxDepth ?? config.maxDepth,
      write: (line) => console.log(line),
      trace: traceHandler,
      runId: crypto.randomUUID(),
    });

    if (result.value !== null) {
      console.log(formatValue(result.value));
    }
    return result.exitStatus;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message, json);
      return 4;
    }
    if (e instanceof CliteRuntimeError) {
      console.error(formatDiagnostic(e.toDiagnostic(), json));
      // A duplicate name is a load error: nothing has run yet.
      return e.kind === "DuplicateFunction" ? 2 : 4;
    }
    emitCliError("E_RUNTIME", errorMessage(e), json);
    return 4;
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        emitCliError("E_IO", `Error closing trace file: ${errorMessage(e)}`, json);
        return 4;
      }
    }
  }
}
