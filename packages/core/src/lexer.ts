/**
 * clite Language Lexer using Chevrotain.
 */
import { createToken, EOF, Lexer, type IToken, type TokenType } from "chevrotain";
import { CliteError, pointSpan } from "./diagnostics.js";

// Identifiers (keywords fall back to Ident when they are only a prefix)
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/, label: "identifier" });

// Categories
export const Keyword = createToken({ name: "Keyword", pattern: Lexer.NA });
export const TypeKeyword = createToken({ name: "TypeKeyword", pattern: Lexer.NA, label: "a type (int, bool, void)" });
export const EqualityOp = createToken({ name: "EqualityOp", pattern: Lexer.NA, label: "'==' or '!='" });
export const RelationalOp = createToken({ name: "RelationalOp", pattern: Lexer.NA, label: "a comparison operator" });
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA, label: "'+' or '-'" });
export const MultiplicativeOp = createToken({ name: "MultiplicativeOp", pattern: Lexer.NA, label: "'*', '/' or '%'" });
export const UnaryOp = createToken({ name: "UnaryOp", pattern: Lexer.NA, label: "'!' or '-'" });

function keyword(word: string, categories: TokenType[] = []): TokenType {
  const name = word.charAt(0).toUpperCase() + word.slice(1);
  return createToken({
    name,
    pattern: new RegExp(word),
    longer_alt: Ident,
    categories: [Keyword, ...categories],
    label: `'${word}'`,
  });
}

// Keywords
export const Let = keyword("let");
export const Fn = keyword("fn");
export const If = keyword("if");
export const Else = keyword("else");
export const While = keyword("while");
export const For = keyword("for");
export const Break = keyword("break");
export const Continue = keyword("continue");
export const Return = keyword("return");
export const True = keyword("true");
export const False = keyword("false");
export const Int = keyword("int", [TypeKeyword]);
export const Bool = keyword("bool", [TypeKeyword]);
export const Void = keyword("void", [TypeKeyword]);

// Literals (no leading minus — unary minus is an operator)
export const IntLit = createToken({ name: "IntLit", pattern: /\d+/, label: "integer literal" });
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\\n\r]|\\.)*"/,
  label: "string literal",
});

// Unterminated forms land in their own group so scan() can report them.
export const INVALID_GROUP = "invalid";
export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: /"(?:[^"\\\n\r]|\\.)*/,
  group: INVALID_GROUP,
});
export const UnterminatedComment = createToken({
  name: "UnterminatedComment",
  pattern: /\/\*[\s\S]*/,
  line_breaks: true,
  group: INVALID_GROUP,
});

// Punctuation
export const LBrace = createToken({ name: "LBrace", pattern: /\{/, label: "'{'" });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/, label: "'}'" });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/, label: "'['" });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/, label: "']'" });
export const LParen = createToken({ name: "LParen", pattern: /\(/, label: "'('" });
export const RParen = createToken({ name: "RParen", pattern: /\)/, label: "')'" });
export const Colon = createToken({ name: "Colon", pattern: /:/, label: "':'" });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/, label: "';'" });
export const Comma = createToken({ name: "Comma", pattern: /,/, label: "','" });

// Logical operators
export const AndAnd = createToken({ name: "AndAnd", pattern: /&&/, label: "'&&'" });
export const OrOr = createToken({ name: "OrOr", pattern: /\|\|/, label: "'||'" });

// Comparison operators (multi-char before single-char)
export const EqEq = createToken({ name: "EqEq", pattern: /==/, categories: [EqualityOp], label: "'=='" });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: [EqualityOp], label: "'!='" });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/, categories: [RelationalOp], label: "'<='" });
export const GtEq = createToken({ name: "GtEq", pattern: />=/, categories: [RelationalOp], label: "'>='" });
export const Lt = createToken({ name: "Lt", pattern: /</, categories: [RelationalOp], label: "'<'" });
export const Gt = createToken({ name: "Gt", pattern: />/, categories: [RelationalOp], label: "'>'" });
export const Equals = createToken({ name: "Equals", pattern: /=/, label: "'='" });
export const Bang = createToken({ name: "Bang", pattern: /!/, categories: [UnaryOp], label: "'!'" });

// Arithmetic operators
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: [AdditiveOp], label: "'+'" });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: [AdditiveOp, UnaryOp], label: "'-'" });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: [MultiplicativeOp], label: "'*'" });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: [MultiplicativeOp], label: "'/'" });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: [MultiplicativeOp], label: "'%'" });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t\f]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r\n|\r|\n/,
  line_breaks: true,
  group: Lexer.SKIPPED,
});
export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\n\r]*/,
  group: Lexer.SKIPPED,
});
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  line_breaks: true,
  group: Lexer.SKIPPED,
});

export const keywordTokens: TokenType[] = [
  Let, Fn, If, Else, While, For, Break, Continue, Return, True, False, Int, Bool, Void,
];

// Token order matters: longer/more specific tokens first
export const allTokens: TokenType[] = [
  WhiteSpace,
  Newline,
  LineComment,
  BlockComment,
  UnterminatedComment, // only when no closing */ exists
  StringLit,
  UnterminatedString,
  IntLit,
  ...keywordTokens,
  Ident,
  // Multi-char operators first (order critical)
  AndAnd,
  OrOr,
  EqEq,
  BangEq,
  LtEq,
  GtEq,
  Lt,
  Gt,
  Equals,
  Bang,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Colon,
  Semicolon,
  Comma,
  // Categories are matched through their members
  Keyword,
  TypeKeyword,
  EqualityOp,
  RelationalOp,
  AdditiveOp,
  MultiplicativeOp,
  UnaryOp,
];

export const CliteLexer = new Lexer(allTokens, { positionTracking: "full" });

// --- Token contract ---

export type TokenKind =
  | "Identifier"
  | "Keyword"
  | "IntLiteral"
  | "StringLiteral"
  | "Operator"
  | "EOF";

export interface Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
  readonly endLine: number;
  readonly endColumn: number;
  readonly offset: number;
  readonly tokenType: TokenType;
}

export type LexProblemKind = "unexpected-char" | "unterminated-string" | "unterminated-comment";

export interface LexProblem {
  kind: LexProblemKind;
  message: string;
  line: number;
  column: number;
  length: number;
  offset: number;
}

export interface ScanResult {
  tokens: Token[];
  problems: LexProblem[];
}

export class CliteLexError extends CliteError {
  constructor(message: string, file: string, line: number, column: number, length = 1) {
    super("E_LEX", message, pointSpan(file, line, column, length), "Check for invalid characters or unclosed strings and comments.");
    this.name = "CliteLexError";
  }
}

function kindOf(type: TokenType): TokenKind {
  if (type === Ident) return "Identifier";
  if (type === IntLit) return "IntLiteral";
  if (type === StringLit) return "StringLiteral";
  if (type === EOF) return "EOF";
  if (keywordTokens.includes(type)) return "Keyword";
  return "Operator";
}

function toToken(t: IToken): Token {
  const line = t.startLine ?? 1;
  const column = t.startColumn ?? 1;
  return {
    kind: kindOf(t.tokenType),
    lexeme: t.image,
    line,
    column,
    endLine: t.endLine ?? line,
    endColumn: t.endColumn ?? column,
    offset: t.startOffset,
    tokenType: t.tokenType,
  };
}

function endOfInput(source: string): Token {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === "\n" || (ch === "\r" && source[i + 1] !== "\n")) {
      line++;
      lineStart = i + 1;
    }
  }
  const column = source.length - lineStart + 1;
  return {
    kind: "EOF",
    lexeme: "",
    line,
    column,
    endLine: line,
    endColumn: column,
    offset: source.length,
    tokenType: EOF,
  };
}

/**
 * Tokenize without throwing. Lexical problems are collected in source order;
 * the token stream always ends with an EOF token.
 */
export function scan(source: string): ScanResult {
  const result = CliteLexer.tokenize(source);
  const problems: LexProblem[] = [];

  for (const err of result.errors) {
    const ch = source.charAt(err.offset);
    problems.push({
      kind: "unexpected-char",
      message: `Unexpected character '${ch}'.`,
      line: err.line ?? 1,
      column: err.column ?? 1,
      length: 1,
      offset: err.offset,
    });
  }

  for (const t of result.groups[INVALID_GROUP] ?? []) {
    const unterminatedString = t.tokenType === UnterminatedString;
    problems.push({
      kind: unterminatedString ? "unterminated-string" : "unterminated-comment",
      message: unterminatedString ? "Unterminated string literal." : "Unterminated block comment.",
      line: t.startLine ?? 1,
      column: t.startColumn ?? 1,
      length: unterminatedString ? t.image.length : 2,
      offset: t.startOffset,
    });
  }

  problems.sort((a, b) => a.offset - b.offset);
  const tokens = result.tokens.map(toToken);
  tokens.push(endOfInput(source));
  return { tokens, problems };
}

/**
 * Tokenize source text. The first lexical problem aborts with a CliteLexError.
 */
export function tokenize(source: string, file = "<stdin>"): Token[] {
  const { tokens, problems } = scan(source);
  const first = problems[0];
  if (first) {
    throw new CliteLexError(first.message, file, first.line, first.column, first.length);
  }
  return tokens;
}

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  '"': '"',
  "\\": "\\",
};

/** Strip the quotes from a string literal lexeme and resolve its escapes. */
export function decodeString(lexeme: string): string {
  return lexeme.slice(1, -1).replace(/\\(.)/g, (_m, ch: string) => ESCAPES[ch] ?? ch);
}
