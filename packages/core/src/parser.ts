/**
 * clite Language Parser using Chevrotain.
 * Produces a clite AST from tokens.
 */
import {
  CstParser,
  EOF,
  createTokenInstance,
  tokenLabel,
  type CstElement,
  type CstNode,
  type IParserErrorMessageProvider,
  type IRecognitionException,
  type IToken,
  type TokenType,
} from "chevrotain";
import {
  allTokens,
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
  TypeKeyword,
  Ident,
  IntLit,
  StringLit,
  LBrace,
  RBrace,
  LParen,
  RParen,
  Colon,
  Semicolon,
  Comma,
  Equals,
  AndAnd,
  OrOr,
  EqualityOp,
  RelationalOp,
  AdditiveOp,
  MultiplicativeOp,
  UnaryOp,
  Bang,
  Minus,
  tokenize,
  decodeString,
  type Token,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { CliteError, pointSpan } from "./diagnostics.js";

export const DEFAULT_MAX_NESTING = 64;

export class CliteParseError extends CliteError {
  expected: string;
  found: string;

  constructor(expected: string, found: string, span: Span, message?: string) {
    super("E_PARSE", message ?? `Expected ${expected}, found ${found}.`, span, "Check syntax near this location.");
    this.name = "CliteParseError";
    this.expected = expected;
    this.found = found;
  }
}

// --- Error messages ---

const RULE_DESCRIPTIONS: Record<string, string> = {
  statement: "a statement",
  expression: "an expression",
  unary: "an expression",
  primary: "an expression",
  forInit: "a 'let' declaration or an assignment",
  forUpdate: "an assignment or a call",
  elseBranch: "'{' or 'if'",
};

function describePaths(paths: TokenType[][]): string {
  const labels: string[] = [];
  for (const path of paths) {
    const first = path[0];
    if (!first) continue;
    const label = tokenLabel(first);
    if (!labels.includes(label)) labels.push(label);
  }
  if (labels.length === 0) return "more input";
  if (labels.length === 1) return labels[0];
  return `one of ${labels.join(", ")}`;
}

// Messages carry only the "expected" half; parse() adds what was found.
const errorMessageProvider: IParserErrorMessageProvider = {
  buildMismatchTokenMessage({ expected }) {
    return tokenLabel(expected);
  },
  buildNotAllInputParsedMessage() {
    return "a function declaration ('fn')";
  },
  buildNoViableAltMessage({ expectedPathsPerAlt, ruleName }) {
    return RULE_DESCRIPTIONS[ruleName] ?? describePaths(expectedPathsPerAlt.flat());
  },
  buildEarlyExitMessage({ expectedIterationPaths, ruleName }) {
    return RULE_DESCRIPTIONS[ruleName] ?? describePaths(expectedIterationPaths);
  },
};

class CliteCstParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
      nodeLocationTracking: "full",
      errorMessageProvider,
    });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.fnDecl);
    });
  });

  fnDecl = this.RULE("fnDecl", () => {
    this.CONSUME(Fn);
    this.CONSUME(Ident);
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.SUBRULE(this.param);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.param);
      });
    });
    this.CONSUME(RParen);
    this.CONSUME(Colon);
    this.CONSUME(TypeKeyword);
    this.SUBRULE(this.block);
  });

  param = this.RULE("param", () => {
    this.CONSUME(Ident);
    this.CONSUME(Colon);
    this.CONSUME(TypeKeyword);
  });

  block = this.RULE("block", () => {
    this.CONSUME(LBrace);
    this.MANY(() => {
      this.SUBRULE(this.statement);
    });
    this.CONSUME(RBrace);
  });

  statement = this.RULE("statement", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.letStmt) },
      { ALT: () => this.SUBRULE(this.ifStmt) },
      { ALT: () => this.SUBRULE(this.whileStmt) },
      { ALT: () => this.SUBRULE(this.forStmt) },
      { ALT: () => this.SUBRULE(this.returnStmt) },
      { ALT: () => this.SUBRULE(this.breakStmt) },
      { ALT: () => this.SUBRULE(this.continueStmt) },
      { ALT: () => this.SUBRULE(this.block) },
      { ALT: () => this.SUBRULE(this.assignStmt) },
      { ALT: () => this.SUBRULE(this.exprStmt) },
    ]);
  });

  letDecl = this.RULE("letDecl", () => {
    this.CONSUME(Let);
    this.CONSUME(Ident);
    this.CONSUME(Colon);
    this.CONSUME(TypeKeyword);
    this.CONSUME(Equals);
    this.SUBRULE(this.expression);
  });

  letStmt = this.RULE("letStmt", () => {
    this.SUBRULE(this.letDecl);
    this.CONSUME(Semicolon);
  });

  assignment = this.RULE("assignment", () => {
    this.CONSUME(Ident);
    this.CONSUME(Equals);
    this.SUBRULE(this.expression);
  });

  assignStmt = this.RULE("assignStmt", () => {
    this.SUBRULE(this.assignment);
    this.CONSUME(Semicolon);
  });

  exprStmt = this.RULE("exprStmt", () => {
    this.SUBRULE(this.expression);
    this.CONSUME(Semicolon);
  });

  ifStmt = this.RULE("ifStmt", () => {
    this.CONSUME(If);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.SUBRULE(this.block);
    this.OPTION(() => {
      this.CONSUME(Else);
      this.SUBRULE(this.elseBranch);
    });
  });

  elseBranch = this.RULE("elseBranch", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.block) },
      { ALT: () => this.SUBRULE(this.ifStmt) },
    ]);
  });

  whileStmt = this.RULE("whileStmt", () => {
    this.CONSUME(While);
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
    this.SUBRULE(this.block);
  });

  forStmt = this.RULE("forStmt", () => {
    this.CONSUME(For);
    this.CONSUME(LParen);
    this.OPTION(() => {
      this.SUBRULE(this.forInit);
    });
    this.CONSUME(Semicolon);
    this.SUBRULE(this.expression);
    this.CONSUME2(Semicolon);
    this.OPTION2(() => {
      this.SUBRULE(this.forUpdate);
    });
    this.CONSUME(RParen);
    this.SUBRULE(this.block);
  });

  forInit = this.RULE("forInit", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.letDecl) },
      { ALT: () => this.SUBRULE(this.assignment) },
    ]);
  });

  forUpdate = this.RULE("forUpdate", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.assignment) },
      { ALT: () => this.SUBRULE(this.expression) },
    ]);
  });

  returnStmt = this.RULE("returnStmt", () => {
    this.CONSUME(Return);
    this.OPTION(() => {
      this.SUBRULE(this.expression);
    });
    this.CONSUME(Semicolon);
  });

  breakStmt = this.RULE("breakStmt", () => {
    this.CONSUME(Break);
    this.CONSUME(Semicolon);
  });

  continueStmt = this.RULE("continueStmt", () => {
    this.CONSUME(Continue);
    this.CONSUME(Semicolon);
  });

  // --- Expressions: one rule per precedence level, loosest first ---

  expression = this.RULE("expression", () => {
    this.SUBRULE(this.orExpr);
  });

  orExpr = this.RULE("orExpr", () => {
    this.SUBRULE(this.andExpr);
    this.MANY(() => {
      this.CONSUME(OrOr);
      this.SUBRULE2(this.andExpr);
    });
  });

  andExpr = this.RULE("andExpr", () => {
    this.SUBRULE(this.equality);
    this.MANY(() => {
      this.CONSUME(AndAnd);
      this.SUBRULE2(this.equality);
    });
  });

  equality = this.RULE("equality", () => {
    this.SUBRULE(this.relational);
    this.MANY(() => {
      this.CONSUME(EqualityOp);
      this.SUBRULE2(this.relational);
    });
  });

  relational = this.RULE("relational", () => {
    this.SUBRULE(this.additive);
    this.MANY(() => {
      this.CONSUME(RelationalOp);
      this.SUBRULE2(this.additive);
    });
  });

  additive = this.RULE("additive", () => {
    this.SUBRULE(this.multiplicative);
    this.MANY(() => {
      this.CONSUME(AdditiveOp);
      this.SUBRULE2(this.multiplicative);
    });
  });

  multiplicative = this.RULE("multiplicative", () => {
    this.SUBRULE(this.unary);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp);
      this.SUBRULE2(this.unary);
    });
  });

  unary = this.RULE("unary", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(UnaryOp);
          this.SUBRULE(this.unary);
        },
      },
      { ALT: () => this.SUBRULE(this.primary) },
    ]);
  });

  primary = this.RULE("primary", () => {
    this.OR([
      { ALT: () => this.CONSUME(IntLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.SUBRULE(this.identOrCall) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.expression);
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  // ident that might be followed by an argument list (function call)
  identOrCall = this.RULE("identOrCall", () => {
    this.CONSUME(Ident);
    this.OPTION(() => {
      this.CONSUME(LParen);
      this.OPTION2(() => {
        this.SUBRULE(this.expression);
        this.MANY(() => {
          this.CONSUME(Comma);
          this.SUBRULE2(this.expression);
        });
      });
      this.CONSUME(RParen);
    });
  });
}

// Singleton parser instance
const cstParser = new CliteCstParser();

// --- CST helpers ---

function isCstNode(el: CstElement): el is CstNode {
  return "children" in el;
}

function isToken(el: CstElement): el is IToken {
  return "image" in el;
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isCstNode);
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

function node(cst: CstNode, key: string): CstNode {
  const n = nodes(cst, key)[0];
  if (!n) throw new Error(`Missing '${key}' in ${cst.name}`);
  return n;
}

function token(cst: CstNode, key: string): IToken {
  const t = tokens(cst, key)[0];
  if (!t) throw new Error(`Missing '${key}' token in ${cst.name}`);
  return t;
}

// --- CST to AST visitor ---

interface VisitContext {
  file: string;
  loopDepth: number;
}

function tokenSpan(t: IToken, file: string): Span {
  return {
    file,
    startLine: t.startLine ?? 1,
    startCol: t.startColumn ?? 1,
    endLine: t.endLine ?? 1,
    endCol: (t.endColumn ?? 1) + 1,
  };
}

function cstSpan(cst: CstNode, file: string, fallback?: Span): Span {
  const loc = cst.location;
  // an empty rule (a program with no functions) reports NaN offsets
  if (loc && !Number.isNaN(loc.startLine) && !Number.isNaN(loc.startColumn)) {
    return {
      file,
      startLine: loc.startLine ?? 1,
      startCol: loc.startColumn ?? 1,
      endLine: loc.endLine ?? 1,
      endCol: (loc.endColumn ?? 1) + 1,
    };
  }
  return fallback ?? { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function joinSpans(a: Span, b: Span): Span {
  return { file: a.file, startLine: a.startLine, startCol: a.startCol, endLine: b.endLine, endCol: b.endCol };
}

function typeName(t: IToken): AST.TypeName {
  switch (t.image) {
    case "int":
      return "int";
    case "bool":
      return "bool";
    case "void":
      return "void";
    default:
      throw new Error(`Unknown type '${t.image}'`);
  }
}

function visitProgram(cst: CstNode, file: string, eof: Span): AST.Program {
  const ctx: VisitContext = { file, loopDepth: 0 };
  const functions = nodes(cst, "fnDecl").map((f) => visitFnDecl(f, ctx));
  return { kind: "Program", span: cstSpan(cst, file, eof), functions };
}

function visitFnDecl(cst: CstNode, ctx: VisitContext): AST.FnDecl {
  return {
    kind: "FnDecl",
    span: cstSpan(cst, ctx.file),
    name: token(cst, "Ident").image,
    params: nodes(cst, "param").map((p) => visitParam(p, ctx)),
    returnType: typeName(token(cst, "TypeKeyword")),
    body: visitBlock(node(cst, "block"), { file: ctx.file, loopDepth: 0 }),
  };
}

function visitParam(cst: CstNode, ctx: VisitContext): AST.Param {
  return {
    kind: "Param",
    span: cstSpan(cst, ctx.file),
    name: token(cst, "Ident").image,
    type: typeName(token(cst, "TypeKeyword")),
  };
}

function visitBlock(cst: CstNode, ctx: VisitContext): AST.Block {
  return {
    kind: "Block",
    span: cstSpan(cst, ctx.file),
    statements: nodes(cst, "statement").map((s) => visitStatement(s, ctx)),
  };
}

function visitStatement(cst: CstNode, ctx: VisitContext): AST.Stmt {
  const c = cst.children;
  if (c["letStmt"]) return visitLetDecl(node(node(cst, "letStmt"), "letDecl"), ctx);
  if (c["ifStmt"]) return visitIfStmt(node(cst, "ifStmt"), ctx);
  if (c["whileStmt"]) return visitWhileStmt(node(cst, "whileStmt"), ctx);
  if (c["forStmt"]) return visitForStmt(node(cst, "forStmt"), ctx);
  if (c["returnStmt"]) return visitReturnStmt(node(cst, "returnStmt"), ctx);
  if (c["breakStmt"]) return visitLoopJump(node(cst, "breakStmt"), "BreakStmt", ctx);
  if (c["continueStmt"]) return visitLoopJump(node(cst, "continueStmt"), "ContinueStmt", ctx);
  if (c["block"]) return visitBlock(node(cst, "block"), ctx);
  if (c["assignStmt"]) return visitAssignment(node(node(cst, "assignStmt"), "assignment"), ctx);
  if (c["exprStmt"]) {
    const stmt = node(cst, "exprStmt");
    return { kind: "ExprStmt", span: cstSpan(stmt, ctx.file), expr: visitExpr(node(stmt, "expression"), ctx) };
  }
  throw new Error("Unknown statement type");
}

function visitLetDecl(cst: CstNode, ctx: VisitContext): AST.LetStmt {
  return {
    kind: "LetStmt",
    span: cstSpan(cst, ctx.file),
    name: token(cst, "Ident").image,
    type: typeName(token(cst, "TypeKeyword")),
    init: visitExpr(node(cst, "expression"), ctx),
  };
}

function visitAssignment(cst: CstNode, ctx: VisitContext): AST.AssignStmt {
  return {
    kind: "AssignStmt",
    span: cstSpan(cst, ctx.file),
    target: token(cst, "Ident").image,
    value: visitExpr(node(cst, "expression"), ctx),
  };
}

function visitIfStmt(cst: CstNode, ctx: VisitContext): AST.IfStmt {
  const result: AST.IfStmt = {
    kind: "IfStmt",
    span: cstSpan(cst, ctx.file),
    cond: visitExpr(node(cst, "expression"), ctx),
    then: visitBlock(node(cst, "block"), ctx),
  };
  const elseBranch = nodes(cst, "elseBranch")[0];
  if (elseBranch) {
    const nestedIf = nodes(elseBranch, "ifStmt")[0];
    if (nestedIf) {
      // `else if` is an else block holding a single if statement
      const inner = visitIfStmt(nestedIf, ctx);
      result.else = { kind: "Block", span: inner.span, statements: [inner] };
    } else {
      result.else = visitBlock(node(elseBranch, "block"), ctx);
    }
  }
  return result;
}

function visitWhileStmt(cst: CstNode, ctx: VisitContext): AST.WhileStmt {
  return {
    kind: "WhileStmt",
    span: cstSpan(cst, ctx.file),
    cond: visitExpr(node(cst, "expression"), ctx),
    body: visitBlock(node(cst, "block"), { ...ctx, loopDepth: ctx.loopDepth + 1 }),
  };
}

function visitForStmt(cst: CstNode, ctx: VisitContext): AST.ForStmt {
  const result: AST.ForStmt = {
    kind: "ForStmt",
    span: cstSpan(cst, ctx.file),
    cond: visitExpr(node(cst, "expression"), ctx),
    body: visitBlock(node(cst, "block"), { ...ctx, loopDepth: ctx.loopDepth + 1 }),
  };
  const init = nodes(cst, "forInit")[0];
  if (init) {
    const letDecl = nodes(init, "letDecl")[0];
    result.init = letDecl
      ? visitLetDecl(letDecl, ctx)
      : visitAssignment(node(init, "assignment"), ctx);
  }
  const update = nodes(cst, "forUpdate")[0];
  if (update) {
    const assignment = nodes(update, "assignment")[0];
    if (assignment) {
      result.update = visitAssignment(assignment, ctx);
    } else {
      const expr = node(update, "expression");
      result.update = { kind: "ExprStmt", span: cstSpan(expr, ctx.file), expr: visitExpr(expr, ctx) };
    }
  }
  return result;
}

function visitReturnStmt(cst: CstNode, ctx: VisitContext): AST.ReturnStmt {
  const result: AST.ReturnStmt = { kind: "ReturnStmt", span: cstSpan(cst, ctx.file) };
  const expr = nodes(cst, "expression")[0];
  if (expr) {
    result.value = visitExpr(expr, ctx);
  }
  return result;
}

function visitLoopJump(
  cst: CstNode,
  kind: "BreakStmt" | "ContinueStmt",
  ctx: VisitContext
): AST.BreakStmt | AST.ContinueStmt {
  const span = cstSpan(cst, ctx.file);
  if (ctx.loopDepth === 0) {
    const word = kind === "BreakStmt" ? "break" : "continue";
    throw new CliteParseError(
      "a loop body",
      `'${word}'`,
      span,
      `'${word}' is only allowed inside a 'while' or 'for' body.`
    );
  }
  return { kind, span };
}

function visitExpr(cst: CstNode, ctx: VisitContext): AST.Expr {
  return visitBinaryLevel(node(cst, "orExpr"), ctx);
}

// Operand rule and operator token for each binary precedence level.
const BINARY_LEVELS: Record<string, { operand: string; operator: string }> = {
  orExpr: { operand: "andExpr", operator: "OrOr" },
  andExpr: { operand: "equality", operator: "AndAnd" },
  equality: { operand: "relational", operator: "EqualityOp" },
  relational: { operand: "additive", operator: "RelationalOp" },
  additive: { operand: "multiplicative", operator: "AdditiveOp" },
  multiplicative: { operand: "unary", operator: "MultiplicativeOp" },
};

function visitBinaryLevel(cst: CstNode, ctx: VisitContext): AST.Expr {
  const level = BINARY_LEVELS[cst.name];
  if (!level) {
    return visitUnary(cst, ctx);
  }
  const operands = nodes(cst, level.operand);
  const ops = tokens(cst, level.operator);
  const first = operands[0];
  if (!first) throw new Error(`Missing operand in ${cst.name}`);

  // Left-associative fold
  let left = visitBinaryLevel(first, ctx);
  for (let i = 0; i < ops.length; i++) {
    const rightNode = operands[i + 1];
    if (!rightNode) throw new Error(`Missing right operand in ${cst.name}`);
    const right = visitBinaryLevel(rightNode, ctx);
    left = {
      kind: "BinaryExpr",
      span: joinSpans(left.span, right.span),
      op: binaryOp(ops[i].image),
      left,
      right,
    };
  }
  return left;
}

const BINARY_OPS: Record<string, AST.BinaryOp> = {
  "+": "+", "-": "-", "*": "*", "/": "/", "%": "%",
  "<": "<", "<=": "<=", ">": ">", ">=": ">=",
  "==": "==", "!=": "!=",
  "&&": "&&", "||": "||",
};

function binaryOp(image: string): AST.BinaryOp {
  const op = BINARY_OPS[image];
  if (!op) throw new Error(`Unknown binary operator '${image}'`);
  return op;
}

function visitUnary(cst: CstNode, ctx: VisitContext): AST.Expr {
  const opToken = tokens(cst, "UnaryOp")[0];
  if (opToken) {
    const operand = visitUnary(node(cst, "unary"), ctx);
    return {
      kind: "UnaryExpr",
      span: joinSpans(tokenSpan(opToken, ctx.file), operand.span),
      op: opToken.image === "!" ? "!" : "-",
      operand,
    };
  }
  return visitPrimary(node(cst, "primary"), ctx);
}

function visitPrimary(cst: CstNode, ctx: VisitContext): AST.Expr {
  const c = cst.children;
  if (c["IntLit"]) {
    const t = token(cst, "IntLit");
    return { kind: "IntLiteral", span: tokenSpan(t, ctx.file), value: BigInt(t.image) };
  }
  if (c["StringLit"]) {
    const t = token(cst, "StringLit");
    return { kind: "StrLiteral", span: tokenSpan(t, ctx.file), value: decodeString(t.image) };
  }
  if (c["True"]) {
    return { kind: "BoolLiteral", span: tokenSpan(token(cst, "True"), ctx.file), value: true };
  }
  if (c["False"]) {
    return { kind: "BoolLiteral", span: tokenSpan(token(cst, "False"), ctx.file), value: false };
  }
  if (c["identOrCall"]) {
    return visitIdentOrCall(node(cst, "identOrCall"), ctx);
  }
  // Parenthesized expression
  return visitExpr(node(cst, "expression"), ctx);
}

function visitIdentOrCall(cst: CstNode, ctx: VisitContext): AST.Expr {
  const name = token(cst, "Ident");
  if (cst.children["LParen"]) {
    return {
      kind: "CallExpr",
      span: cstSpan(cst, ctx.file),
      callee: name.image,
      args: nodes(cst, "expression").map((e) => visitExpr(e, ctx)),
    };
  }
  return { kind: "Identifier", span: tokenSpan(name, ctx.file), name: name.image };
}

// --- Token stream handling ---

function toChevrotainToken(t: Token): IToken {
  return createTokenInstance(
    t.tokenType,
    t.lexeme,
    t.offset,
    t.offset + t.lexeme.length - 1,
    t.line,
    t.endLine,
    t.column,
    t.endColumn
  );
}

function describeFound(t: IToken | Token | undefined): string {
  if (!t) return "end of input";
  const image = "image" in t ? t.image : t.lexeme;
  if (t.tokenType === EOF || image === "") return "end of input";
  return `'${image}'`;
}

function isOperandEnd(t: Token): boolean {
  return t.tokenType === Ident || t.tokenType === IntLit || t.tokenType === StringLit
    || t.tokenType === True || t.tokenType === False || t.tokenType === RParen;
}

/**
 * Reject input whose nesting of parentheses, braces and prefix operators
 * exceeds the limit before the recursive parser sees it.
 */
function checkNesting(toks: Token[], file: string, maxNesting: number): void {
  let depth = 0;
  let prefixRun = 0;
  let prev: Token | undefined;
  for (const t of toks) {
    if (t.tokenType === LParen || t.tokenType === LBrace) {
      depth++;
    } else if (t.tokenType === RParen || t.tokenType === RBrace) {
      depth = Math.max(0, depth - 1);
    }
    const isPrefix = (t.tokenType === Bang || t.tokenType === Minus) && !(prev && isOperandEnd(prev));
    prefixRun = isPrefix ? prefixRun + 1 : 0;
    if (depth + prefixRun > maxNesting) {
      throw new CliteParseError(
        `at most ${maxNesting} levels of nesting`,
        describeFound(t),
        pointSpan(file, t.line, t.column, Math.max(1, t.lexeme.length)),
        `Nesting exceeds the limit of ${maxNesting} levels.`
      );
    }
    prev = t;
  }
}

function errorSpan(err: IRecognitionException, toks: Token[], file: string): Span {
  const t = err.token;
  if (t.tokenType === EOF || Number.isNaN(t.startLine) || t.startLine === undefined) {
    const eof = toks[toks.length - 1];
    return pointSpan(file, eof?.line ?? 1, eof?.column ?? 1);
  }
  return tokenSpan(t, file);
}

export interface ParseOptions {
  maxNesting?: number;
}

/**
 * Parse a token stream (as produced by tokenize) into a Program.
 * The first syntax error aborts with a CliteParseError.
 */
export function parseTokens(toks: Token[], file = "<stdin>", opts: ParseOptions = {}): AST.Program {
  checkNesting(toks, file, opts.maxNesting ?? DEFAULT_MAX_NESTING);

  cstParser.input = toks.filter((t) => t.tokenType !== EOF).map(toChevrotainToken);
  let cst: CstNode;
  try {
    cst = cstParser.program();
  } catch (e) {
    if (e instanceof RangeError) {
      const eof = toks[toks.length - 1];
      throw new CliteParseError(
        "shallower nesting",
        "input nested too deeply",
        pointSpan(file, eof?.line ?? 1, eof?.column ?? 1),
        "Input is nested too deeply to parse."
      );
    }
    throw e;
  }

  const err = cstParser.errors[0];
  if (err) {
    throw new CliteParseError(err.message, describeFound(err.token), errorSpan(err, toks, file));
  }

  const eof = toks[toks.length - 1];
  return visitProgram(cst, file, pointSpan(file, eof?.line ?? 1, eof?.column ?? 1, 0));
}

// --- Public API ---

export interface ParseResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
}

export function parse(source: string, file = "<stdin>", opts: ParseOptions = {}): ParseResult {
  try {
    const program = parseTokens(tokenize(source, file), file, opts);
    return { program, diagnostics: [] };
  } catch (e) {
    if (e instanceof CliteError) {
      return { diagnostics: [e.toDiagnostic()] };
    }
    throw e;
  }
}
