/**
 * clite lint - static warnings without execution
 */
import { lint, formatWarning, resolveConfig, CliteConfigError } from "@clite/core";
import type { CliteConfig, SourceFile } from "@clite/core";
import { emitCliError, errorMessage, readSource } from "./output.js";
import type { CommandEnv } from "./output.js";

export interface LintCommandOptions extends CommandEnv {
  failOnWarn?: boolean;
  json?: boolean;
}

export async function runLint(files: string[], opts: LintCommandOptions): Promise<number> {
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

  // Unreadable files are reported; the rest are still linted.
  const sources: SourceFile[] = [];
  let ioFailed = false;
  for (const file of files) {
    try {
      sources.push({ file, source: readSource(file, opts) });
    } catch (e) {
      emitCliError("E_IO", `Error reading file: ${errorMessage(e)}`, json);
      ioFailed = true;
    }
  }

  const warnings = lint(sources, { disable: config.lint?.disable });

  if (json) {
    console.log(JSON.stringify(warnings, null, 2));
  } else {
    for (const w of warnings) {
      console.log(formatWarning(w));
    }
  }

  if (ioFailed) return 4;
  const failOnWarn = opts.failOnWarn ?? config.lint?.failOnWarn ?? false;
  return failOnWarn && warnings.length > 0 ? 1 : 0;
}
