/**
 * Tests for clite config command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runConfig } from "./cmd-config.js";

async function captureConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runConfig(opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("clite config", () => {
  it("prints the built-in defaults when no file exists", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "clite-cli-config-"));
    try {
      const result = await captureConfig({ cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      assert.deepEqual(result.stdout.split("\n"), [
        "Effective clite config",
        "  Source:        default",
        "  Path:          (none)",
        "  Entry:         main",
        "  Max depth:     1000",
        "  Lint disabled: (none)",
        "  Fail on warn:  false",
      ]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("returns the user config as JSON when there is no project file", async () => {
    const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "clite-cli-config-project-"));
    const fakeHome = fs.mkdtempSync(path.join(os.tmpdir(), "clite-cli-config-home-"));
    const userDir = path.join(fakeHome, ".clite");
    const userPath = path.join(userDir, "config.json");
    fs.mkdirSync(userDir, { recursive: true });
    fs.writeFileSync(userPath, JSON.stringify({ version: 1, maxDepth: 50, lint: { disable: ["W005", "W001"] } }));

    try {
      const result = await captureConfig({ json: true, cwd: projectDir, homeDir: fakeHome });
      assert.equal(result.code, 0);
      assert.equal(result.stderr, "");
      assert.deepEqual(JSON.parse(result.stdout), {
        source: "user",
        path: userPath,
        config: { entry: "main", maxDepth: 50, lint: { disable: ["W001", "W005"], failOnWarn: false } },
      });
    } finally {
      fs.rmSync(projectDir, { recursive: true, force: true });
      fs.rmSync(fakeHome, { recursive: true, force: true });
    }
  });

  it("returns 4 with E_CONFIG for an invalid project file", async () => {
    const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "clite-cli-config-project-"));
    fs.writeFileSync(path.join(projectDir, ".clite.json"), JSON.stringify({ version: 1, entry: 3 }));

    try {
      const result = await captureConfig({ cwd: projectDir, homeDir: projectDir });
      assert.equal(result.code, 4);
      assert.equal(result.stdout, "");
      assert.ok(result.stderr.startsWith("<unknown>: error[E_CONFIG]: Invalid config "));
      assert.ok(result.stderr.includes("entry: "));
    } finally {
      fs.rmSync(projectDir, { recursive: true, force: true });
    }
  });
});
