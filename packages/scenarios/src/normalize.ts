/**
 * Black-box trace JSONL parsing and summary computation.
 * Reads the trace format directly rather than through @clite/core.
 */
import { z } from "zod";
import type { TraceSummary } from "./types.js";

const KNOWN_EVENTS = ["run_start", "run_end", "fn_call_start", "fn_call_end", "print"] as const;

const rawTraceEventSchema = z.object({
  event: z.enum(KNOWN_EVENTS),
  data: z.record(z.unknown()).optional(),
});

export type RawTraceEvent = z.infer<typeof rawTraceEventSchema>;

function tryParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/**
 * Parse JSONL content into trace events. Malformed lines and unknown
 * event names are dropped.
 */
export function parseTraceJsonl(content: string): RawTraceEvent[] {
  const events: RawTraceEvent[] = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const parsed = rawTraceEventSchema.safeParse(tryParseJson(trimmed));
    if (parsed.success) events.push(parsed.data);
  }
  return events;
}

/**
 * Compute a TraceSummary from parsed trace events.
 * Volatile fields (runId, ts, durationMs) are left out.
 */
export function computeTraceSummary(events: RawTraceEvent[]): TraceSummary {
  const summary: TraceSummary = {
    totalEvents: events.length,
    fnCalls: 0,
    fnCallsByName: {},
    prints: 0,
    failures: 0,
  };

  for (const ev of events) {
    if (ev.event === "fn_call_start") {
      summary.fnCalls++;
      const fn = ev.data?.["fn"];
      const name = typeof fn === "string" ? fn : "unknown";
      summary.fnCallsByName[name] = (summary.fnCallsByName[name] ?? 0) + 1;
    }
    if (ev.event === "print") {
      summary.prints++;
    }
    if (ev.event === "run_end" && ev.data?.["error"]) {
      summary.failures++;
    }
  }

  return summary;
}
