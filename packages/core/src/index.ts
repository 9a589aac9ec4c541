/**
 * @clite/core - clite Language Core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { tokenize, scan, decodeString, CliteLexError } from "./lexer.js";
export type { Token, TokenKind, LexProblem, LexProblemKind, ScanResult } from "./lexer.js";
export { parse, parseTokens, CliteParseError, DEFAULT_MAX_NESTING } from "./parser.js";
export type { ParseResult, ParseOptions } from "./parser.js";
export {
  run,
  loadFunctions,
  formatValue,
  CliteRuntimeError,
  RUNTIME_ERROR_CODES,
  DEFAULT_MAX_DEPTH,
} from "./interpreter.js";
export type {
  CliteValue,
  RuntimeErrorKind,
  RunOptions,
  RunResult,
  TraceEvent,
  TraceEventType,
  TraceData,
} from "./interpreter.js";
export { lint, lintSource, formatWarning, isLintCode, LINT_CODES } from "./linter.js";
export type { LintCode, LintWarning, LintOptions, SourceFile } from "./linter.js";
export { resolveConfig, loadConfigFile, configSchema, CliteConfigError, PROJECT_CONFIG_FILE } from "./config.js";
export type { CliteConfig, ResolvedConfig } from "./config.js";
