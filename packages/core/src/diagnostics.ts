/**
 * clite Diagnostic types for lex/parse/load/runtime errors.
 */
import type { Span } from "./ast.js";

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

/**
 * Base class for every error the pipeline raises. Each one points at the
 * source position of the offending token or node.
 */
export class CliteError extends Error {
  code: string;
  span: Span;
  hint?: string;

  constructor(code: string, message: string, span: Span, hint?: string) {
    super(message);
    this.name = "CliteError";
    this.code = code;
    this.span = span;
    this.hint = hint;
  }

  get line(): number {
    return this.span.startLine;
  }

  get column(): number {
    return this.span.startCol;
  }

  toDiagnostic(): Diagnostic {
    return makeDiag(this.code, this.message, this.span, this.hint);
  }
}

export function pointSpan(file: string, line: number, column: number, length = 1): Span {
  return { file, startLine: line, startCol: column, endLine: line, endCol: column + length };
}

export function formatDiagnostic(d: Diagnostic, json: boolean): string {
  if (json) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  let out = `${loc}: error[${d.code}]: ${d.message}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], json: boolean): string {
  if (json) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, false)).join("\n");
}
