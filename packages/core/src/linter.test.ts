/**
 * Tests for the clite linter.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { lint, lintSource, formatWarning, isLintCode } from "./linter.js";

const MISSING_COLON = "fn main(): void {\n  let x int = 1;\n}\n";
const UNCLOSED_BRACE = "fn main(): void {\n  print(1);\n";

function brief(source: string): string[] {
  return lintSource(source, "t.cl").map((w) => `${w.line}:${w.column} ${w.code} ${w.message}`);
}

describe("clite Linter", () => {
  it("reports nothing for a clean program", () => {
    const src = `fn main(): void {
  let n: int = 3;
  while (n > 0) {
    if (n == 2) {
      print("two");
    } else if (n == 1) {
      print(n);
    } else {
      print(helper(n));
    }
    n = n - 1;
  }
  for (let i: int = 0; i < 2; i = i + 1) {
    if (i == 1) { break; }
  }
  return;
}

fn helper(k: int): int {
  return -k * 2;
}
`;
    assert.deepEqual(brief(src), []);
  });

  it("W003: flags let without a type annotation", () => {
    assert.deepEqual(lintSource(MISSING_COLON, "d.cl"), [
      {
        code: "W003",
        message: "Missing ':' in variable declaration",
        file: "d.cl",
        line: 2,
        column: 7,
      },
    ]);
  });

  it("W004: flags an unclosed brace", () => {
    assert.deepEqual(brief(UNCLOSED_BRACE), ["1:17 W004 Unclosed '{'"]);
  });

  it("W004: flags unmatched closers", () => {
    assert.deepEqual(brief("fn main(): void {\n  print(1));\n}\n"), ["2:11 W004 Unmatched ')'"]);
    assert.deepEqual(brief("fn main(): void {\n  ]\n}\n"), ["2:3 W004 Unmatched ']'"]);
  });

  it("W001: flags a statement without ';' where the ';' belongs", () => {
    const src = "fn main(): void {\n  let x: int = 1\n  print(x);\n}\n";
    assert.deepEqual(brief(src), ["2:17 W001 Missing ';' at end of statement"]);
  });

  it("W001: flags a statement cut off by a closing brace", () => {
    const src = "fn main(): void {\n  print(1)\n}\n";
    assert.deepEqual(brief(src), ["2:11 W001 Missing ';' at end of statement"]);
  });

  it("W001: does not flag multi-line expressions", () => {
    const src = "fn main(): void {\n  let total: int = 1\n    + 2;\n  print(total);\n}\n";
    assert.deepEqual(brief(src), []);
  });

  it("W002: flags undefined variables, assignments and calls", () => {
    const src = "fn main(): void {\n  y = 1;\n  print(z);\n  g();\n}\n";
    assert.deepEqual(brief(src), [
      "2:3 W002 Assignment to undefined variable 'y'",
      "3:9 W002 Use of undefined variable 'z'",
      "4:3 W002 Call to undefined function 'g'",
    ]);
  });

  it("W002: respects block scope", () => {
    const src = "fn main(): void {\n  { let a: int = 1; }\n  print(a);\n}\n";
    assert.deepEqual(brief(src), ["3:9 W002 Use of undefined variable 'a'"]);
  });

  it("W002: sees parameters and functions declared later", () => {
    const src = "fn main(): void {\n  print(add(1, 2));\n}\nfn add(a: int, b: int): int {\n  return a + b;\n}\n";
    assert.deepEqual(brief(src), []);
  });

  it("W002: scopes a for initializer to its loop", () => {
    const src =
      "fn main(): void {\n  for (let i: int = 0; i < 3; i = i + 1) {\n    print(i);\n  }\n  print(i);\n}\n";
    assert.deepEqual(brief(src), ["5:9 W002 Use of undefined variable 'i'"]);
  });

  it("W002: a let is not visible in its own initializer", () => {
    const src = "fn main(): void {\n  let x: int = x;\n}\n";
    assert.deepEqual(brief(src), ["2:16 W002 Use of undefined variable 'x'"]);
  });

  it("W005: flags control keywords without '('", () => {
    const src = "fn main(): void {\n  while true {\n    print(1);\n  }\n}\n";
    assert.deepEqual(brief(src), ["2:3 W005 Expected '(' after 'while'"]);
  });

  it("W006: flags an unterminated string and orders warnings by position", () => {
    const src = 'fn main(): void {\n  print("oops);\n}\n';
    assert.deepEqual(brief(src), [
      "2:8 W004 Unclosed '('",
      "2:9 W001 Missing ';' at end of statement",
      "2:9 W006 Unterminated string literal",
    ]);
  });

  it("never throws on garbage", () => {
    const warnings = lintSource("}}} ((( let let : $ # \"", "g.cl");
    assert.ok(warnings.length > 0);
    assert.ok(warnings.every((w) => w.file === "g.cl"));
  });

  it("suppresses disabled codes", () => {
    assert.deepEqual(lintSource(MISSING_COLON, "d.cl", { disable: ["W003"] }), []);
  });

  it("concatenates files in the given order", () => {
    const warnings = lint([
      { file: "b.cl", source: MISSING_COLON },
      { file: "a.cl", source: UNCLOSED_BRACE },
    ]);
    assert.deepEqual(
      warnings.map((w) => [w.file, w.code]),
      [["b.cl", "W003"], ["a.cl", "W004"]]
    );
  });

  it("is idempotent", () => {
    const files = [{ file: "x.cl", source: 'fn main(): void {\n  let q = "a;\n  if q {\n' }];
    assert.deepEqual(lint(files), lint(files));
  });

  it("formats warnings as file:line:column: CODE message", () => {
    const [w] = lintSource(MISSING_COLON, "d.cl");
    assert.equal(formatWarning(w), "d.cl:2:7: W003 Missing ':' in variable declaration");
  });

  it("recognizes lint codes", () => {
    assert.equal(isLintCode("W004"), true);
    assert.equal(isLintCode("W007"), false);
  });
});
