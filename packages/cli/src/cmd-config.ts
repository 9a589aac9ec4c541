/**
 * clite config - effective configuration summary command
 */
import { resolveConfig, CliteConfigError, DEFAULT_MAX_DEPTH } from "@clite/core";
import type { ResolvedConfig } from "@clite/core";
import { emitCliError } from "./output.js";
import type { CommandEnv } from "./output.js";

export async function runConfig(opts: CommandEnv & { json?: boolean }): Promise<number> {
  const json = !!opts.json;

  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (e instanceof CliteConfigError) {
      emitCliError(e.code, e.message, json);
      return 4;
    }
    throw e;
  }

  const { config } = resolved;
  const effective = {
    entry: config.entry ?? "main",
    maxDepth: config.maxDepth ?? DEFAULT_MAX_DEPTH,
    lint: {
      disable: [...(config.lint?.disable ?? [])].sort(),
      failOnWarn: config.lint?.failOnWarn ?? false,
    },
  };

  if (json) {
    console.log(
      JSON.stringify({ source: resolved.source, path: resolved.path, config: effective }, null, 2)
    );
    return 0;
  }

  const disabled = effective.lint.disable;
  console.log("Effective clite config");
  console.log(`  Source:        ${resolved.source}`);
  console.log(`  Path:          ${resolved.path ?? "(none)"}`);
  console.log(`  Entry:         ${effective.entry}`);
  console.log(`  Max depth:     ${effective.maxDepth}`);
  console.log(`  Lint disabled: ${disabled.length > 0 ? disabled.join(", ") : "(none)"}`);
  console.log(`  Fail on warn:  ${effective.lint.failOnWarn}`);
  return 0;
}
