import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { assertJsonSubset, assertMatchesRegex, findSubsetMismatch, parseJsonOutput } from "./assertions.js";

describe("assertJsonSubset", () => {
  it("matches nested object subsets", () => {
    const actual = {
      code: "E_TYPE",
      message: "Condition of 'if' must be bool, got int.",
      span: { file: "program.cl", startLine: 2, startCol: 7, endLine: 2, endCol: 8 },
    };
    const subset = { code: "E_TYPE", span: { file: "program.cl", startLine: 2 } };
    assert.doesNotThrow(() => assertJsonSubset(actual, subset, "subset-check"));
  });

  it("matches array prefixes", () => {
    assert.equal(findSubsetMismatch({ nums: [1, 2, 3, 4] }, { nums: [1, 2] }), null);
    assert.equal(
      findSubsetMismatch({ nums: [1] }, { nums: [1, 2] }),
      "$.nums: expected at least 2 items but got 1"
    );
  });

  it("reports where values differ", () => {
    assert.equal(findSubsetMismatch({ a: { b: 1 } }, { a: { b: 2 } }), "$.a.b: expected 2 but got 1");
    assert.equal(findSubsetMismatch([{ x: 1 }], [[1]]), "$[0]: expected array but got object");
    assert.equal(findSubsetMismatch(null, { a: 1 }), "$: expected object but got null");
  });

  it("fails on missing keys", () => {
    assert.throws(
      () => assertJsonSubset({ code: "E_TYPE" }, { code: "E_TYPE", span: { file: "x.cl" } }, "missing-key"),
      /missing-key: JSON subset mismatch at \$\.span: key missing/
    );
  });
});

describe("parseJsonOutput", () => {
  it("parses JSON text", () => {
    assert.deepEqual(parseJsonOutput('{"ok":true}\n', "out"), { ok: true });
  });

  it("fails with the label on non-JSON text", () => {
    assert.throws(() => parseJsonOutput("nope", "stdout of 'x'"), /stdout of 'x': output is not JSON/);
  });
});

describe("assertMatchesRegex", () => {
  it("matches valid regex patterns", () => {
    assert.doesNotThrow(() => assertMatchesRegex("error[E_IO]: failed", "error\\[E_IO\\]", "regex-pass"));
  });

  it("fails when text does not match regex", () => {
    assert.throws(() => assertMatchesRegex("hello", "^world$", "regex-fail"), /did not match regex/);
  });

  it("fails on invalid regex patterns", () => {
    assert.throws(() => assertMatchesRegex("hello", "[unterminated", "regex-invalid"), /invalid regex/);
  });
});
