/**
 * clite check - static validation command
 */
import { parse, loadFunctions, formatDiagnostic, formatDiagnostics, CliteRuntimeError } from "@clite/core";
import { emitCliError, errorMessage, readSource } from "./output.js";
import type { CommandEnv } from "./output.js";

export async function runCheck(
  file: string,
  opts: CommandEnv & { json?: boolean }
): Promise<number> {
  const json = !!opts.json;

  let source: string;
  try {
    source = readSource(file, opts);
  } catch (e) {
    emitCliError("E_IO", `Error reading file: ${errorMessage(e)}`, json);
    return 4;
  }

  const parseResult = parse(source, file);
  if (parseResult.diagnostics.length > 0 || !parseResult.program) {
    console.error(formatDiagnostics(parseResult.diagnostics, json));
    return 2;
  }

  try {
    loadFunctions(parseResult.program);
  } catch (e) {
    if (e instanceof CliteRuntimeError) {
      console.error(formatDiagnostic(e.toDiagnostic(), json));
      return 2;
    }
    throw e;
  }

  console.log(json ? "[]" : "No errors found.");
  return 0;
}
