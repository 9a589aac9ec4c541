/**
 * clite AST Node Definitions
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

export type TypeName = "int" | "bool" | "void";

/** Functions every program can call without declaring them. */
export const BUILTIN_FUNCTIONS: ReadonlySet<string> = new Set(["print"]);

// --- Literals ---
export interface IntLiteral extends BaseNode {
  kind: "IntLiteral";
  value: bigint;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export interface StrLiteral extends BaseNode {
  kind: "StrLiteral";
  value: string;
}

export type Literal = IntLiteral | BoolLiteral | StrLiteral;

// --- Expressions ---
export interface Identifier extends BaseNode {
  kind: "Identifier";
  name: string;
}

export type UnaryOp = "!" | "-";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

export type BinaryOp =
  | "+" | "-" | "*" | "/" | "%"
  | "<" | "<=" | ">" | ">="
  | "==" | "!="
  | "&&" | "||";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface CallExpr extends BaseNode {
  kind: "CallExpr";
  callee: string;
  args: Expr[];
}

export type Expr = Literal | Identifier | UnaryExpr | BinaryExpr | CallExpr;

// --- Statements ---
export interface Block extends BaseNode {
  kind: "Block";
  statements: Stmt[];
}

export interface LetStmt extends BaseNode {
  kind: "LetStmt";
  name: string;
  type: TypeName;
  init: Expr;
}

export interface AssignStmt extends BaseNode {
  kind: "AssignStmt";
  target: string;
  value: Expr;
}

export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  cond: Expr;
  then: Block;
  else?: Block;
}

export interface WhileStmt extends BaseNode {
  kind: "WhileStmt";
  cond: Expr;
  body: Block;
}

export interface ForStmt extends BaseNode {
  kind: "ForStmt";
  init?: LetStmt | AssignStmt;
  cond: Expr;
  update?: AssignStmt | ExprStmt;
  body: Block;
}

export interface ReturnStmt extends BaseNode {
  kind: "ReturnStmt";
  value?: Expr;
}

export interface BreakStmt extends BaseNode {
  kind: "BreakStmt";
}

export interface ContinueStmt extends BaseNode {
  kind: "ContinueStmt";
}

export interface ExprStmt extends BaseNode {
  kind: "ExprStmt";
  expr: Expr;
}

export type Stmt =
  | Block
  | LetStmt
  | AssignStmt
  | IfStmt
  | WhileStmt
  | ForStmt
  | ReturnStmt
  | BreakStmt
  | ContinueStmt
  | ExprStmt;

// --- Declarations ---
export interface Param extends BaseNode {
  kind: "Param";
  name: string;
  type: TypeName;
}

export interface FnDecl extends BaseNode {
  kind: "FnDecl";
  name: string;
  params: Param[];
  returnType: TypeName;
  body: Block;
}

// --- Program ---
export interface Program extends BaseNode {
  kind: "Program";
  functions: FnDecl[];
}
