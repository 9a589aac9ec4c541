/**
 * clite Interpreter - walks the AST of a loaded program.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { BUILTIN_FUNCTIONS } from "./ast.js";
import { CliteError } from "./diagnostics.js";

// --- Value types ---

/** Int, Bool, String, or Void (null). */
export type CliteValue = bigint | boolean | string | null;

export function formatValue(v: CliteValue): string {
  if (v === null) return "void";
  if (typeof v === "boolean") return v ? "true" : "false";
  return typeof v === "bigint" ? v.toString() : v;
}

function kindName(v: CliteValue): string {
  if (v === null) return "void";
  switch (typeof v) {
    case "bigint":
      return "int";
    case "boolean":
      return "bool";
    default:
      return "string";
  }
}

// --- Trace events ---
export type TraceEventType = "run_start" | "run_end" | "fn_call_start" | "fn_call_end" | "print";

export type TraceData = { [key: string]: string | number | boolean | null };

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

// --- Runtime error ---
export type RuntimeErrorKind =
  | "TypeMismatch"
  | "DivisionByZero"
  | "UndefinedVariable"
  | "UndefinedFunction"
  | "ArityMismatch"
  | "NonVoidFallthrough"
  | "StackLimitExceeded"
  | "IntegerTooLarge"
  | "DuplicateFunction";

export const RUNTIME_ERROR_CODES: Record<RuntimeErrorKind, string> = {
  TypeMismatch: "E_TYPE",
  DivisionByZero: "E_DIV_ZERO",
  UndefinedVariable: "E_UNBOUND",
  UndefinedFunction: "E_UNKNOWN_FN",
  ArityMismatch: "E_ARITY",
  NonVoidFallthrough: "E_NO_RETURN",
  StackLimitExceeded: "E_STACK",
  IntegerTooLarge: "E_INT_SIZE",
  DuplicateFunction: "E_FN_DUP",
};

export class CliteRuntimeError extends CliteError {
  kind: RuntimeErrorKind;

  constructor(kind: RuntimeErrorKind, message: string, span: Span, hint?: string) {
    super(RUNTIME_ERROR_CODES[kind], message, span, hint);
    this.name = "CliteRuntimeError";
    this.kind = kind;
  }
}

// --- Environment ---
class Env {
  private bindings = new Map<string, CliteValue>();
  private parent: Env | null;

  constructor(parent: Env | null = null) {
    this.parent = parent;
  }

  child(): Env {
    return new Env(this);
  }

  /** Bind in this scope, shadowing any outer binding. */
  declare(name: string, value: CliteValue): void {
    this.bindings.set(name, value);
  }

  get(name: string): CliteValue | undefined {
    if (this.bindings.has(name)) return this.bindings.get(name);
    if (this.parent) return this.parent.get(name);
    return undefined;
  }

  /** Update the nearest existing binding. Returns false if there is none. */
  assign(name: string, value: CliteValue): boolean {
    if (this.bindings.has(name)) {
      this.bindings.set(name, value);
      return true;
    }
    if (this.parent) return this.parent.assign(name, value);
    return false;
  }

  has(name: string): boolean {
    if (this.bindings.has(name)) return true;
    if (this.parent) return this.parent.has(name);
    return false;
  }
}

// --- Completions ---
type Completion =
  | { type: "normal" }
  | { type: "return"; value: CliteValue }
  | { type: "break" }
  | { type: "continue" };

const NORMAL: Completion = { type: "normal" };

// --- Options / result ---
export const DEFAULT_MAX_DEPTH = 1000;

export interface RunOptions {
  /** Entry function name (default "main"). */
  entry?: string;
  /** When false the program is loaded but nothing is called. */
  callEntry?: boolean;
  /** Receives each printed line, without its terminator. */
  write: (line: string) => void;
  maxDepth?: number;
  trace?: (event: TraceEvent) => void;
  runId?: string;
}

export interface RunResult {
  exitStatus: number;
  value: CliteValue;
}

interface RunState {
  functions: Map<string, AST.FnDecl>;
  globals: Env;
  write: (line: string) => void;
  maxDepth: number;
  depth: number;
  emitTrace: (event: TraceEventType, span?: Span, data?: TraceData) => void;
}

/**
 * Build the name → function table. A repeated name, or one that collides
 * with a builtin, is rejected before anything runs.
 */
export function loadFunctions(program: AST.Program): Map<string, AST.FnDecl> {
  const functions = new Map<string, AST.FnDecl>();
  for (const fn of program.functions) {
    if (BUILTIN_FUNCTIONS.has(fn.name)) {
      throw new CliteRuntimeError(
        "DuplicateFunction",
        `Function '${fn.name}' conflicts with the builtin of the same name.`,
        fn.span
      );
    }
    if (functions.has(fn.name)) {
      throw new CliteRuntimeError(
        "DuplicateFunction",
        `Function '${fn.name}' is already defined.`,
        fn.span,
        "Rename one of the functions."
      );
    }
    functions.set(fn.name, fn);
  }
  return functions;
}

// --- Interpreter ---
export function run(program: AST.Program, options: RunOptions): RunResult {
  const runId = options.runId ?? "run";
  const runStartMs = Date.now();

  const emitTrace = (event: TraceEventType, span?: Span, data?: TraceData) => {
    if (options.trace) {
      options.trace({
        ts: new Date().toISOString(),
        runId,
        event,
        span,
        data,
      });
    }
  };

  const entry = options.entry ?? "main";
  emitTrace("run_start", program.span, { file: program.span.file, entry });

  let value: CliteValue = null;
  try {
    const state: RunState = {
      functions: loadFunctions(program),
      globals: new Env(),
      write: options.write,
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
      depth: 0,
      emitTrace,
    };

    if (options.callEntry ?? true) {
      const fn = state.functions.get(entry);
      if (!fn) {
        throw new CliteRuntimeError(
          "UndefinedFunction",
          `Entry function '${entry}' is not defined.`,
          program.span,
          "Define it, or choose another entry function."
        );
      }
      if (fn.params.length > 0) {
        throw new CliteRuntimeError(
          "ArityMismatch",
          `Entry function '${entry}' must take no parameters, but declares ${fn.params.length}.`,
          fn.span
        );
      }
      value = guardHostStack(() => callFunction(fn, [], fn.span, state), fn.span);
    }
    emitTrace("run_end", program.span, { durationMs: Date.now() - runStartMs });
  } catch (e) {
    const errorData: TraceData = { durationMs: Date.now() - runStartMs };
    if (e instanceof CliteRuntimeError) {
      errorData["error"] = e.code;
      errorData["message"] = e.message;
    } else {
      errorData["error"] = "E_RUNTIME";
      errorData["message"] = e instanceof Error ? e.message : String(e);
    }
    emitTrace("run_end", program.span, errorData);
    throw e;
  }

  return { exitStatus: 0, value };
}

function isHostStackOverflow(e: unknown): boolean {
  return e instanceof RangeError && /call stack/i.test(e.message);
}

function guardHostStack<T>(fn: () => T, span: Span): T {
  try {
    return fn();
  } catch (e) {
    if (isHostStackOverflow(e)) {
      throw new CliteRuntimeError("StackLimitExceeded", "Host call stack exhausted.", span);
    }
    throw e;
  }
}

function enter(state: RunState, span: Span): void {
  state.depth++;
  if (state.depth > state.maxDepth) {
    throw new CliteRuntimeError(
      "StackLimitExceeded",
      `Nesting depth exceeds the limit of ${state.maxDepth}.`,
      span,
      "Check for unbounded recursion, or raise --max-depth."
    );
  }
}

function callFunction(fn: AST.FnDecl, args: CliteValue[], callSpan: Span, state: RunState): CliteValue {
  if (args.length !== fn.params.length) {
    throw new CliteRuntimeError(
      "ArityMismatch",
      `Function '${fn.name}' expects ${fn.params.length} argument(s), got ${args.length}.`,
      callSpan
    );
  }

  enter(state, callSpan);
  try {
    state.emitTrace("fn_call_start", callSpan, { fn: fn.name });
    const fnEnv = state.globals.child();
    fn.params.forEach((param, i) => {
      fnEnv.declare(param.name, args[i] ?? null);
    });

    const completion = execBlock(fn.body, fnEnv, state);
    let result: CliteValue = null;
    if (completion.type === "return") {
      result = completion.value;
    } else if (fn.returnType !== "void") {
      throw new CliteRuntimeError(
        "NonVoidFallthrough",
        `Function '${fn.name}' must return a ${fn.returnType} value but reached the end of its body.`,
        fn.body.span,
        "Add a return statement on every path."
      );
    }
    state.emitTrace("fn_call_end", callSpan, { fn: fn.name });
    return result;
  } finally {
    state.depth--;
  }
}

/** Run a block's statements in a fresh child scope. */
function execBlock(block: AST.Block, env: Env, state: RunState): Completion {
  enter(state, block.span);
  try {
    const scope = env.child();
    for (const stmt of block.statements) {
      const completion = execStmt(stmt, scope, state);
      if (completion.type !== "normal") return completion;
    }
    return NORMAL;
  } finally {
    state.depth--;
  }
}

function execStmt(stmt: AST.Stmt, env: Env, state: RunState): Completion {
  switch (stmt.kind) {
    case "LetStmt":
      env.declare(stmt.name, evalExpr(stmt.init, env, state));
      return NORMAL;

    case "AssignStmt": {
      const val = evalExpr(stmt.value, env, state);
      if (!env.assign(stmt.target, val)) {
        throw new CliteRuntimeError(
          "UndefinedVariable",
          `Assignment to undefined variable '${stmt.target}'.`,
          stmt.span,
          "Declare it with 'let' first."
        );
      }
      return NORMAL;
    }

    case "ExprStmt":
      evalExpr(stmt.expr, env, state);
      return NORMAL;

    case "Block":
      return execBlock(stmt, env, state);

    case "IfStmt":
      if (evalCondition(stmt.cond, env, state, "if")) {
        return execBlock(stmt.then, env, state);
      }
      return stmt.else ? execBlock(stmt.else, env, state) : NORMAL;

    case "WhileStmt":
      while (evalCondition(stmt.cond, env, state, "while")) {
        const completion = execBlock(stmt.body, env, state);
        if (completion.type === "break") break;
        if (completion.type === "return") return completion;
      }
      return NORMAL;

    case "ForStmt": {
      // The init binding lives in its own scope around the loop.
      const loopEnv = env.child();
      if (stmt.init) execStmt(stmt.init, loopEnv, state);
      while (evalCondition(stmt.cond, loopEnv, state, "for")) {
        const completion = execBlock(stmt.body, loopEnv, state);
        if (completion.type === "break") break;
        if (completion.type === "return") return completion;
        if (stmt.update) execStmt(stmt.update, loopEnv, state);
      }
      return NORMAL;
    }

    case "ReturnStmt":
      return { type: "return", value: stmt.value ? evalExpr(stmt.value, env, state) : null };

    case "BreakStmt":
      return { type: "break" };

    case "ContinueStmt":
      return { type: "continue" };
  }
}

function evalCondition(expr: AST.Expr, env: Env, state: RunState, construct: string): boolean {
  const val = evalExpr(expr, env, state);
  if (typeof val !== "boolean") {
    throw new CliteRuntimeError(
      "TypeMismatch",
      `Condition of '${construct}' must be bool, got ${kindName(val)}.`,
      expr.span
    );
  }
  return val;
}

function evalExpr(expr: AST.Expr, env: Env, state: RunState): CliteValue {
  switch (expr.kind) {
    case "IntLiteral":
    case "BoolLiteral":
    case "StrLiteral":
      return expr.value;

    case "Identifier": {
      const val = env.get(expr.name);
      if (val === undefined) {
        throw new CliteRuntimeError(
          "UndefinedVariable",
          `Undefined variable '${expr.name}'.`,
          expr.span
        );
      }
      return val;
    }

    case "UnaryExpr": {
      const operand = evalExpr(expr.operand, env, state);
      if (expr.op === "!") {
        if (typeof operand !== "boolean") {
          throw typeMismatch(`Operator '!' expects bool, got ${kindName(operand)}.`, expr.span);
        }
        return !operand;
      }
      if (typeof operand !== "bigint") {
        throw typeMismatch(`Unary '-' expects int, got ${kindName(operand)}.`, expr.span);
      }
      return -operand;
    }

    case "BinaryExpr":
      return evalBinary(expr, env, state);

    case "CallExpr": {
      // Arguments are evaluated left to right in the caller's scope.
      const args = expr.args.map((a) => evalExpr(a, env, state));
      if (expr.callee === "print") {
        return callPrint(args, expr.span, state);
      }
      const fn = state.functions.get(expr.callee);
      if (!fn) {
        throw new CliteRuntimeError(
          "UndefinedFunction",
          `Undefined function '${expr.callee}'.`,
          expr.span
        );
      }
      return callFunction(fn, args, expr.span, state);
    }
  }
}

function callPrint(args: CliteValue[], span: Span, state: RunState): CliteValue {
  const arg = args[0];
  if (args.length !== 1 || arg === undefined) {
    throw new CliteRuntimeError(
      "ArityMismatch",
      `Function 'print' expects 1 argument, got ${args.length}.`,
      span
    );
  }
  const text = formatValue(arg);
  state.emitTrace("print", span, { text });
  state.write(text);
  return null;
}

function typeMismatch(message: string, span: Span): CliteRuntimeError {
  return new CliteRuntimeError("TypeMismatch", message, span);
}

function intArithmetic(op: "+" | "-" | "*", left: bigint, right: bigint, span: Span): bigint {
  try {
    return op === "+" ? left + right : op === "-" ? left - right : left * right;
  } catch (e) {
    if (e instanceof RangeError && !isHostStackOverflow(e)) {
      throw new CliteRuntimeError("IntegerTooLarge", `Result of '${op}' is too large to represent.`, span);
    }
    throw e;
  }
}

function evalBinary(expr: AST.BinaryExpr, env: Env, state: RunState): CliteValue {
  const { op } = expr;

  // Short-circuit: the right operand is only evaluated when needed
  if (op === "&&" || op === "||") {
    const left = evalExpr(expr.left, env, state);
    if (typeof left !== "boolean") {
      throw typeMismatch(`Operator '${op}' expects bool operands, got ${kindName(left)}.`, expr.left.span);
    }
    if (op === "&&" ? !left : left) return left;
    const right = evalExpr(expr.right, env, state);
    if (typeof right !== "boolean") {
      throw typeMismatch(`Operator '${op}' expects bool operands, got ${kindName(right)}.`, expr.right.span);
    }
    return right;
  }

  const left = evalExpr(expr.left, env, state);
  const right = evalExpr(expr.right, env, state);

  if (op === "==" || op === "!=") {
    if (left === null || right === null || kindName(left) !== kindName(right)) {
      throw typeMismatch(
        `Operator '${op}' cannot compare ${kindName(left)} with ${kindName(right)}.`,
        expr.span
      );
    }
    return op === "==" ? left === right : left !== right;
  }

  if (op === "+" && typeof left === "string" && typeof right === "string") {
    return left + right;
  }

  if (typeof left !== "bigint" || typeof right !== "bigint") {
    throw typeMismatch(
      `Operator '${op}' expects int operands, got ${kindName(left)} and ${kindName(right)}.`,
      expr.span
    );
  }

  switch (op) {
    case "+":
    case "-":
    case "*":
      return intArithmetic(op, left, right, expr.span);
    case "/":
    case "%":
      if (right === 0n) {
        throw new CliteRuntimeError("DivisionByZero", "Division by zero.", expr.span);
      }
      // bigint division truncates toward zero; remainder takes the dividend's sign
      return op === "/" ? left / right : left % right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;
  }
}
