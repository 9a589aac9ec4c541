import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { validateScenarioConfig } from "./types.js";
import type { ScenarioConfig } from "./types.js";
import { SCENARIO_FILE, discoverScenarios, getScenarioRoots } from "./discovery.js";

const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../..");

function loadScenarioConfigs(): ScenarioConfig[] {
  return discoverScenarios(getScenarioRoots(REPO_ROOT)).map((scenario) => {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(scenario.dir, SCENARIO_FILE), "utf-8"));
    return validateScenarioConfig(raw, scenario.id);
  });
}

describe("scenario coverage guardrails", () => {
  const configs = loadScenarioConfigs();

  it("covers each expectation assertion mode at least once", () => {
    const expectFields = [
      "stdoutText",
      "stdoutJson",
      "stdoutJsonSubset",
      "stdoutContains",
      "stderrText",
      "stderrJsonSubset",
      "stderrContains",
      "stderrRegex",
      "traceSummary",
    ] as const;

    for (const field of expectFields) {
      const usage = configs.filter((cfg) => cfg.expect[field] !== undefined).length;
      assert.ok(usage > 0, `No scenarios use expect.${field}`);
    }
  });

  it("covers key scenario config knobs at least once", () => {
    assert.ok(configs.some((cfg) => cfg.capture?.trace === true), "No scenarios set 'capture.trace'");
    assert.ok(configs.some((cfg) => cfg.config !== undefined), "No scenarios set 'config'");
    assert.ok(configs.every((cfg) => (cfg.meta?.tags?.length ?? 0) > 0), "Every scenario needs 'meta.tags'");
  });

  it("covers every exit code the CLI documents", () => {
    const exitCodes = new Set(configs.map((cfg) => cfg.expect.exitCode));
    for (const code of [0, 1, 2, 4]) {
      assert.ok(exitCodes.has(code), `No scenarios expect exit code ${code}`);
    }
  });

  it("covers all CLI commands and key flags in scenario command vectors", () => {
    const commands = new Set<string>();
    const flags = new Set<string>();

    for (const cfg of configs) {
      commands.add(cfg.cmd[0]);
      for (const token of cfg.cmd) {
        if (token.startsWith("--")) flags.add(token);
      }
    }

    for (const command of ["run", "lint", "check", "trace", "config"]) {
      assert.ok(commands.has(command), `No scenarios invoke '${command}'`);
    }
    for (const flag of ["--json", "--entry", "--max-depth", "--fail-on-warn"]) {
      assert.ok(flags.has(flag), `No scenarios exercise '${flag}'`);
    }
  });
});
