/**
 * Tests for the clite config loader.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { resolveConfig, CliteConfigError } from "./config.js";

describe("clite Config", () => {
  let cwd: string;
  let home: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), "clite-cwd-"));
    home = fs.mkdtempSync(path.join(os.tmpdir(), "clite-home-"));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(home, { recursive: true, force: true });
  });

  function writeProject(data: unknown): string {
    const p = path.join(cwd, ".clite.json");
    fs.writeFileSync(p, typeof data === "string" ? data : JSON.stringify(data));
    return p;
  }

  function writeUser(data: unknown): string {
    fs.mkdirSync(path.join(home, ".clite"));
    const p = path.join(home, ".clite", "config.json");
    fs.writeFileSync(p, JSON.stringify(data));
    return p;
  }

  it("falls back to defaults when no file exists", () => {
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "default");
    assert.equal(resolved.path, null);
    assert.deepEqual(resolved.config, { version: 1 });
  });

  it("loads the project file", () => {
    const p = writeProject({ version: 1, entry: "start", maxDepth: 200, lint: { disable: ["W002"] } });
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "project");
    assert.equal(resolved.path, p);
    assert.equal(resolved.config.entry, "start");
    assert.equal(resolved.config.maxDepth, 200);
    assert.deepEqual(resolved.config.lint?.disable, ["W002"]);
  });

  it("loads the user file when there is no project file", () => {
    const p = writeUser({ version: 1, lint: { failOnWarn: true } });
    const resolved = resolveConfig(cwd, home);
    assert.equal(resolved.source, "user");
    assert.equal(resolved.path, p);
    assert.equal(resolved.config.lint?.failOnWarn, true);
  });

  it("prefers the project file over the user file", () => {
    writeUser({ version: 1, entry: "fromUser" });
    writeProject({ version: 1, entry: "fromProject" });
    assert.equal(resolveConfig(cwd, home).config.entry, "fromProject");
  });

  it("reports malformed JSON", () => {
    writeProject("not valid json{{{");
    assert.throws(() => resolveConfig(cwd, home), CliteConfigError);
  });

  it("reports values that do not fit the schema", () => {
    writeProject({ version: 1, maxDepth: -5 });
    assert.throws(
      () => resolveConfig(cwd, home),
      (err: unknown) => {
        assert.ok(err instanceof CliteConfigError);
        assert.equal(err.code, "E_CONFIG");
        assert.match(err.message, /maxDepth/);
        return true;
      }
    );
  });

  it("rejects unknown lint codes", () => {
    writeProject({ version: 1, lint: { disable: ["W999"] } });
    assert.throws(() => resolveConfig(cwd, home), /lint\.disable\.0/);
  });

  it("reports a config path that cannot be read", () => {
    const p = path.join(cwd, ".clite.json");
    fs.mkdirSync(p);
    assert.throws(
      () => resolveConfig(cwd, home),
      (err: unknown) => {
        assert.ok(err instanceof CliteConfigError);
        assert.equal(err.code, "E_CONFIG");
        assert.equal(err.path, p);
        assert.ok(err.message.startsWith(`Invalid config ${p}: cannot read file:`));
        return true;
      }
    );
  });

  it("rejects unknown keys and other versions", () => {
    writeProject({ version: 1, colour: "blue" });
    assert.throws(() => resolveConfig(cwd, home), CliteConfigError);
    writeProject({ version: 2 });
    assert.throws(() => resolveConfig(cwd, home), /config 'version' must be 1/);
  });
});
