/**
 * Shared helpers for command output and file access.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { formatDiagnostic } from "@clite/core";

export interface CommandEnv {
  /** Directory relative paths and the project config resolve against. */
  cwd?: string;
  homeDir?: string;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function emitCliError(code: string, message: string, json: boolean): void {
  console.error(formatDiagnostic({ code, message }, json));
}

export function resolvePath(file: string, env: CommandEnv): string {
  return path.resolve(env.cwd ?? process.cwd(), file);
}

export function readSource(file: string, env: CommandEnv): string {
  return fs.readFileSync(resolvePath(file, env), "utf-8");
}
