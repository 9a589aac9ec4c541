/**
 * Tests for clite trace command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runTrace } from "./cmd-trace.js";

async function captureTrace(
  file: string,
  opts: { json?: boolean }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runTrace(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

const EVENTS = [
  { ts: "2026-01-01T00:00:00.000Z", runId: "r1", event: "run_start", data: { file: "p.cl", entry: "main" } },
  { ts: "2026-01-01T00:00:00.001Z", runId: "r1", event: "fn_call_start", data: { fn: "main" } },
  { ts: "2026-01-01T00:00:00.002Z", runId: "r1", event: "fn_call_start", data: { fn: "twice" } },
  { ts: "2026-01-01T00:00:00.003Z", runId: "r1", event: "fn_call_end", data: { fn: "twice" } },
  { ts: "2026-01-01T00:00:00.004Z", runId: "r1", event: "print", data: { text: "4" } },
  {
    ts: "2026-01-01T00:00:00.025Z",
    runId: "r1",
    event: "run_end",
    data: { error: "E_DIV_ZERO", message: "Division by zero.", durationMs: 25 },
  },
];

describe("clite trace summary", () => {
  let tmpDir: string;
  let tracePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "clite-cli-trace-"));
    tracePath = path.join(tmpDir, "trace.jsonl");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("summarizes calls, prints and the failure as JSON", async () => {
    fs.writeFileSync(tracePath, EVENTS.map((e) => JSON.stringify(e)).join("\n") + "\n", "utf-8");
    const result = await captureTrace(tracePath, { json: true });
    assert.equal(result.code, 0);
    assert.deepEqual(JSON.parse(result.stdout), {
      runId: "r1",
      totalEvents: 6,
      malformedLines: 0,
      fnCalls: 2,
      fnCallsByName: { main: 1, twice: 1 },
      prints: 1,
      failures: 1,
      error: "E_DIV_ZERO",
      startTime: "2026-01-01T00:00:00.000Z",
      endTime: "2026-01-01T00:00:00.025Z",
      durationMs: 25,
    });
  });

  it("prints a readable summary by default", async () => {
    fs.writeFileSync(tracePath, EVENTS.map((e) => JSON.stringify(e)).join("\n"), "utf-8");
    const result = await captureTrace(tracePath, {});
    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split("\n"), [
      "Trace Summary",
      "  Run ID:          r1",
      "  Total events:    6",
      "  Function calls:  2",
      "  Functions called:",
      "    main: 1",
      "    twice: 1",
      "  Prints:          1",
      "  Failures:        1",
      "  Error:           E_DIV_ZERO",
      "  Duration:        25ms",
    ]);
  });

  it("counts malformed lines instead of failing", async () => {
    const lines = ["{not json", JSON.stringify({ event: "print" }), JSON.stringify(EVENTS[0])];
    fs.writeFileSync(tracePath, lines.join("\n"), "utf-8");
    const result = await captureTrace(tracePath, { json: true });
    assert.equal(result.code, 0);
    const summary = JSON.parse(result.stdout) as { totalEvents: number; malformedLines: number; failures: number };
    assert.equal(summary.totalEvents, 1);
    assert.equal(summary.malformedLines, 2);
    assert.equal(summary.failures, 0);
  });

  it("returns 4 when no valid event is found", async () => {
    fs.writeFileSync(tracePath, "garbage\n", "utf-8");
    const result = await captureTrace(tracePath, {});
    assert.equal(result.code, 4);
    assert.equal(result.stderr, "<unknown>: error[E_IO]: No valid trace events found.");
  });

  it("reports an empty trace as a JSON diagnostic with --json", async () => {
    fs.writeFileSync(tracePath, "garbage\n", "utf-8");
    const result = await captureTrace(tracePath, { json: true });
    assert.equal(result.code, 4);
    assert.equal(result.stdout, "");
    assert.deepEqual(JSON.parse(result.stderr), { code: "E_IO", message: "No valid trace events found." });
  });

  it("returns 4 when the trace file cannot be read", async () => {
    const result = await captureTrace(path.join(tmpDir, "missing.jsonl"), {});
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith("<unknown>: error[E_IO]: Error reading trace file:"));
  });

  it("reports an unreadable trace as a JSON diagnostic with --json", async () => {
    const result = await captureTrace(path.join(tmpDir, "missing.jsonl"), { json: true });
    assert.equal(result.code, 4);
    const diag = JSON.parse(result.stderr) as { code: string; message: string };
    assert.equal(diag.code, "E_IO");
    assert.ok(diag.message.startsWith("Error reading trace file:"));
  });
});
