/**
 * clite trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";
import { emitCliError, errorMessage, resolvePath } from "./output.js";
import type { CommandEnv } from "./output.js";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  span: z.unknown().optional(),
  data: z.record(z.unknown()).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

interface TraceSummary {
  runId: string;
  totalEvents: number;
  malformedLines: number;
  fnCalls: number;
  fnCallsByName: Record<string, number>;
  prints: number;
  failures: number;
  error?: string;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function dataString(ev: TraceLine, key: string): string | undefined {
  const value = ev.data?.[key];
  return typeof value === "string" ? value : undefined;
}

export async function runTrace(
  file: string,
  opts: CommandEnv & { json?: boolean }
): Promise<number> {
  const json = !!opts.json;
  let content: string;
  try {
    content = fs.readFileSync(resolvePath(file, opts), "utf-8");
  } catch (e) {
    emitCliError("E_IO", `Error reading trace file: ${errorMessage(e)}`, json);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let malformedLines = 0;

  for (const line of lines) {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      malformedLines++;
      continue;
    }
    const parsed = traceLineSchema.safeParse(raw);
    if (parsed.success) {
      events.push(parsed.data);
    } else {
      malformedLines++;
    }
  }

  const first = events[0];
  if (!first) {
    emitCliError("E_IO", "No valid trace events found.", json);
    return 4;
  }

  const summary: TraceSummary = {
    runId: first.runId,
    totalEvents: events.length,
    malformedLines,
    fnCalls: 0,
    fnCallsByName: {},
    prints: 0,
    failures: 0,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        const error = dataString(ev, "error");
        if (error) {
          summary.failures++;
          summary.error = error;
        }
        break;
      }
      case "fn_call_start": {
        summary.fnCalls++;
        const name = dataString(ev, "fn") ?? "unknown";
        summary.fnCallsByName[name] = (summary.fnCallsByName[name] ?? 0) + 1;
        break;
      }
      case "print":
        summary.prints++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs =
      new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }

  if (json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(`Trace Summary`);
    console.log(`  Run ID:          ${summary.runId}`);
    console.log(`  Total events:    ${summary.totalEvents}`);
    if (summary.malformedLines > 0) {
      console.log(`  Malformed lines: ${summary.malformedLines}`);
    }
    console.log(`  Function calls:  ${summary.fnCalls}`);
    if (Object.keys(summary.fnCallsByName).length > 0) {
      console.log(`  Functions called:`);
      for (const [name, count] of Object.entries(summary.fnCallsByName)) {
        console.log(`    ${name}: ${count}`);
      }
    }
    console.log(`  Prints:          ${summary.prints}`);
    console.log(`  Failures:        ${summary.failures}`);
    if (summary.error) {
      console.log(`  Error:           ${summary.error}`);
    }
    if (summary.durationMs !== undefined) {
      console.log(`  Duration:        ${summary.durationMs}ms`);
    }
  }

  return 0;
}
