/**
 * clite Linter - token-level heuristics that never parse or execute.
 *
 * Every rule works on the tolerant token stream from scan(), so malformed
 * programs still produce warnings for whatever can be recognized.
 */
import type { TokenType } from "chevrotain";
import {
  scan,
  Let,
  Fn,
  If,
  Else,
  While,
  For,
  Break,
  Continue,
  Return,
  True,
  False,
  Ident,
  IntLit,
  StringLit,
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Colon,
  Semicolon,
  Equals,
  Bang,
  Minus,
  type LexProblem,
  type Token,
} from "./lexer.js";
import { BUILTIN_FUNCTIONS } from "./ast.js";

export const LINT_CODES = ["W001", "W002", "W003", "W004", "W005", "W006"] as const;
export type LintCode = (typeof LINT_CODES)[number];

export interface LintWarning {
  code: LintCode;
  message: string;
  file: string;
  line: number;
  column: number;
}

export interface SourceFile {
  file: string;
  source: string;
}

export interface LintOptions {
  /** Codes to suppress. */
  disable?: readonly LintCode[];
}

type Finding = Omit<LintWarning, "file">;

function is(t: Token | undefined, ...types: TokenType[]): boolean {
  return t !== undefined && types.includes(t.tokenType);
}

const STATEMENT_KEYWORDS: TokenType[] = [Let, Fn, If, While, For, Return, Break, Continue, Else];
const CONTROL_KEYWORDS: TokenType[] = [If, While, For];
const OPERAND_START: TokenType[] = [Ident, IntLit, StringLit, True, False];
const OPERAND_END: TokenType[] = [Ident, IntLit, StringLit, True, False, RParen];
const STATEMENT_START: TokenType[] = [
  Let, Return, Break, Continue, Ident, IntLit, StringLit, True, False, LParen, Bang, Minus,
];

/** An operand that follows a finished operand starts the next statement. */
function startsNewStatement(prev: Token, t: Token): boolean {
  const boundary = t.line > prev.endLine || is(prev, RParen);
  return boundary && is(prev, ...OPERAND_END) && is(t, ...OPERAND_START);
}

/** Index just past the parenthesized group opening at `open`. */
function skipGroup(toks: Token[], open: number): number {
  let depth = 0;
  let j = open;
  for (; j < toks.length; j++) {
    const t = toks[j];
    if (is(t, LParen)) depth++;
    else if (is(t, RParen)) {
      depth--;
      if (depth === 0) return j + 1;
    } else if (is(t, LBrace, RBrace) || t.kind === "EOF") {
      return j;
    }
  }
  return j;
}

// --- W001: missing ';' ---

interface StatementEnd {
  terminated: boolean;
  next: number;
  last: Token;
}

function scanStatement(toks: Token[], start: number): StatementEnd {
  let depth = 0;
  let last = toks[start];
  for (let j = start; j < toks.length; j++) {
    const t = toks[j];
    if (is(t, Semicolon)) return { terminated: true, next: j + 1, last };
    if (t.kind === "EOF" || is(t, LBrace, RBrace)) return { terminated: false, next: j, last };
    if (j > start && depth === 0) {
      if (is(t, ...STATEMENT_KEYWORDS) || startsNewStatement(last, t)) {
        return { terminated: false, next: j, last };
      }
    }
    if (is(t, LParen)) depth++;
    else if (is(t, RParen)) depth = Math.max(0, depth - 1);
    last = t;
  }
  return { terminated: false, next: toks.length, last };
}

function checkSemicolons(toks: Token[]): Finding[] {
  const out: Finding[] = [];
  let inFnHeader = false;
  let i = 0;
  while (i < toks.length) {
    const t = toks[i];
    if (t.kind === "EOF") break;

    if (inFnHeader) {
      if (is(t, LBrace, RBrace, Semicolon)) inFnHeader = false;
      i++;
      continue;
    }
    if (is(t, Fn)) {
      inFnHeader = true;
      i++;
      continue;
    }
    if (is(t, ...CONTROL_KEYWORDS)) {
      if (is(toks[i + 1], LParen)) {
        i = skipGroup(toks, i + 1);
      } else {
        // Without '(' the header runs up to the body
        i++;
        while (i < toks.length && !is(toks[i], LBrace, RBrace, Semicolon) && toks[i].kind !== "EOF") i++;
      }
      continue;
    }
    if (is(t, ...STATEMENT_START)) {
      const end = scanStatement(toks, i);
      if (!end.terminated) {
        out.push({
          code: "W001",
          message: "Missing ';' at end of statement",
          line: end.last.endLine,
          column: end.last.endColumn + 1,
        });
      }
      i = Math.max(i + 1, end.next);
      continue;
    }
    i++;
  }
  return out;
}

// --- W002: undefined names ---

interface Scope {
  names: Set<string>;
  /** Holds a `for` header's bindings; closes with the loop body. */
  loopHeader: boolean;
}

function undefinedMessage(name: string, next: Token | undefined): string {
  if (is(next, LParen)) return `Call to undefined function '${name}'`;
  if (is(next, Equals)) return `Assignment to undefined variable '${name}'`;
  return `Use of undefined variable '${name}'`;
}

function checkUndefinedNames(toks: Token[]): Finding[] {
  const out: Finding[] = [];
  const globals = new Set<string>(BUILTIN_FUNCTIONS);
  toks.forEach((t, i) => {
    const next = toks[i + 1];
    if (is(t, Fn) && next && is(next, Ident)) globals.add(next.lexeme);
  });

  const scopes: Scope[] = [{ names: globals, loopHeader: false }];
  const isDefined = (name: string) => scopes.some((s) => s.names.has(name));
  const current = () => scopes[scopes.length - 1];

  let fnParams: Set<string> | null = null;
  let pendingLet: string | null = null;
  const declarePending = () => {
    if (pendingLet !== null) {
      current().names.add(pendingLet);
      pendingLet = null;
    }
  };

  toks.forEach((t, i) => {
    const prev = toks[i - 1];
    const next = toks[i + 1];

    // A `let` missing its ';' still binds once the next statement begins
    if (is(t, ...STATEMENT_KEYWORDS) || (prev && startsNewStatement(prev, t))) {
      declarePending();
    }
    if (is(t, Fn)) {
      fnParams = new Set();
      return;
    }
    if (is(t, LBrace)) {
      declarePending();
      scopes.push({ names: fnParams ?? new Set(), loopHeader: false });
      fnParams = null;
      return;
    }
    if (is(t, RBrace)) {
      declarePending();
      if (scopes.length > 1) scopes.pop();
      if (scopes.length > 1 && current().loopHeader) scopes.pop();
      return;
    }
    if (is(t, Semicolon)) {
      declarePending();
      return;
    }
    if (is(t, For)) {
      scopes.push({ names: new Set(), loopHeader: true });
      return;
    }
    if (!is(t, Ident)) return;

    if (fnParams !== null) {
      // Inside a function header: names followed by ':' are parameters
      if (is(next, Colon)) fnParams.add(t.lexeme);
      return;
    }
    if (is(prev, Let)) {
      pendingLet = t.lexeme;
      return;
    }
    if (!isDefined(t.lexeme)) {
      out.push({ code: "W002", message: undefinedMessage(t.lexeme, next), line: t.line, column: t.column });
    }
  });
  return out;
}

// --- W003: `let NAME` without ':' ---

function checkLetColons(toks: Token[]): Finding[] {
  const out: Finding[] = [];
  toks.forEach((t, i) => {
    const name = toks[i + 1];
    const after = toks[i + 2];
    if (is(t, Let) && name && is(name, Ident) && after && !is(after, Colon)) {
      out.push({
        code: "W003",
        message: "Missing ':' in variable declaration",
        line: name.line,
        column: name.column,
      });
    }
  });
  return out;
}

// --- W004: delimiter balance ---

const CLOSERS = new Map<TokenType, TokenType>([
  [RParen, LParen],
  [RBrace, LBrace],
  [RBracket, LBracket],
]);

function checkDelimiters(toks: Token[]): Finding[] {
  const out: Finding[] = [];
  const unclosed = (t: Token): Finding => ({
    code: "W004",
    message: `Unclosed '${t.lexeme}'`,
    line: t.line,
    column: t.column,
  });
  const stack: Token[] = [];
  for (const t of toks) {
    if (is(t, LParen, LBrace, LBracket)) {
      stack.push(t);
      continue;
    }
    const opener = CLOSERS.get(t.tokenType);
    if (!opener) continue;
    let match = stack.length - 1;
    while (match >= 0 && stack[match].tokenType !== opener) match--;
    if (match < 0) {
      out.push({ code: "W004", message: `Unmatched '${t.lexeme}'`, line: t.line, column: t.column });
      continue;
    }
    // Openers above the match were never closed
    for (const open of stack.splice(match)) {
      if (open.tokenType !== opener) out.push(unclosed(open));
    }
  }
  out.push(...stack.map(unclosed));
  return out;
}

// --- W005: control keyword without '(' ---

function checkControlParens(toks: Token[]): Finding[] {
  const out: Finding[] = [];
  toks.forEach((t, i) => {
    if (is(t, ...CONTROL_KEYWORDS) && !is(toks[i + 1], LParen)) {
      out.push({ code: "W005", message: `Expected '(' after '${t.lexeme}'`, line: t.line, column: t.column });
    }
  });
  return out;
}

// --- W006: unterminated strings ---

function checkStrings(problems: LexProblem[]): Finding[] {
  return problems
    .filter((p) => p.kind === "unterminated-string")
    .map((p): Finding => ({ code: "W006", message: "Unterminated string literal", line: p.line, column: p.column }));
}

/** Lint one file. Warnings are ordered by line, then column. */
export function lintSource(source: string, file: string, options: LintOptions = {}): LintWarning[] {
  const { tokens, problems } = scan(source);
  const findings = [
    ...checkSemicolons(tokens),
    ...checkUndefinedNames(tokens),
    ...checkLetColons(tokens),
    ...checkDelimiters(tokens),
    ...checkControlParens(tokens),
    ...checkStrings(problems),
  ];
  const disabled = new Set<LintCode>(options.disable ?? []);
  return findings
    .filter((f) => !disabled.has(f.code))
    .sort((a, b) => a.line - b.line || a.column - b.column)
    .map((f) => ({ ...f, file }));
}

/** Lint several files; each file's warnings follow the previous file's. */
export function lint(files: readonly SourceFile[], options: LintOptions = {}): LintWarning[] {
  return files.flatMap((f) => lintSource(f.source, f.file, options));
}

export function formatWarning(w: LintWarning): string {
  return `${w.file}:${w.line}:${w.column}: ${w.code} ${w.message}`;
}

export function isLintCode(value: string): value is LintCode {
  return LINT_CODES.some((c) => c === value);
}
