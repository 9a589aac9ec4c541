import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { validateScenarioConfig } from "./types.js";

function expectInvalid(raw: unknown, message: string): void {
  assert.throws(
    () => validateScenarioConfig(raw, "test-scenario"),
    (err: unknown) => {
      assert.ok(err instanceof Error);
      assert.equal(err.message, message);
      return true;
    }
  );
}

describe("validateScenarioConfig", () => {
  it("accepts a valid config with optional fields", () => {
    const raw = {
      cmd: ["run", "program.cl"],
      meta: { tags: ["smoke"] },
      config: { version: 1, entry: "start" },
      capture: { trace: true },
      expect: {
        exitCode: 0,
        stdoutText: "42\n",
        stdoutJsonSubset: { ok: true },
        stderrContains: "warn",
        stderrRegex: "E_[A-Z]+",
        traceSummary: { totalEvents: 3, fnCalls: 1, fnCallsByName: { main: 1 }, prints: 0, failures: 0 },
      },
    };
    const validated = validateScenarioConfig(raw, "test-scenario");
    assert.equal(validated.expect.exitCode, 0);
    assert.deepEqual(validated.cmd, ["run", "program.cl"]);
    assert.equal(validated.capture?.trace, true);
  });

  it("rejects non-object roots and missing required fields", () => {
    expectInvalid(null, "Scenario 'test-scenario': Expected object, received null");
    expectInvalid({}, "Scenario 'test-scenario': 'cmd' Required");
    expectInvalid({ cmd: ["run", "program.cl"] }, "Scenario 'test-scenario': 'expect' Required");
    expectInvalid(
      { cmd: ["run", "program.cl"], expect: {} },
      "Scenario 'test-scenario': 'expect.exitCode' Required"
    );
  });

  it("rejects invalid cmd entries", () => {
    expectInvalid(
      { cmd: [], expect: { exitCode: 0 } },
      "Scenario 'test-scenario': 'cmd' must be a non-empty string array"
    );
    expectInvalid(
      { cmd: ["run", 42], expect: { exitCode: 0 } },
      "Scenario 'test-scenario': 'cmd[1]' Expected string, received number"
    );
  });

  it("rejects unknown fields", () => {
    expectInvalid(
      { cmd: ["run"], stdin: "x", expect: { exitCode: 0 } },
      "Scenario 'test-scenario': Unrecognized key(s) in object: 'stdin'"
    );
  });

  it("rejects malformed trace summaries", () => {
    expectInvalid(
      {
        cmd: ["run"],
        expect: { exitCode: 0, traceSummary: { totalEvents: 1, fnCalls: 0, fnCallsByName: {}, prints: "0", failures: 0 } },
      },
      "Scenario 'test-scenario': 'expect.traceSummary.prints' Expected number, received string"
    );
  });
});
