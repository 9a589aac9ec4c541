/**
 * Scenario configuration types and runtime validation.
 */
import { z } from "zod";

const traceSummarySchema = z
  .object({
    totalEvents: z.number().int(),
    fnCalls: z.number().int(),
    fnCallsByName: z.record(z.number().int()),
    prints: z.number().int(),
    failures: z.number().int(),
  })
  .strict();

export type TraceSummary = z.infer<typeof traceSummarySchema>;

const expectationsSchema = z
  .object({
    exitCode: z.number().int(),
    stdoutText: z.string().optional(),
    stdoutJson: z.unknown().optional(),
    stdoutJsonSubset: z.unknown().optional(),
    stdoutContains: z.string().optional(),
    stderrText: z.string().optional(),
    stderrJsonSubset: z.unknown().optional(),
    stderrContains: z.string().optional(),
    stderrRegex: z.string().optional(),
    traceSummary: traceSummarySchema.optional(),
  })
  .strict();

export type Expectations = z.infer<typeof expectationsSchema>;

export const scenarioConfigSchema = z
  .object({
    cmd: z.array(z.string()).nonempty({ message: "must be a non-empty string array" }),
    meta: z.object({ tags: z.array(z.string()).optional() }).strict().optional(),
    /** Written to the work directory as the project config file. */
    config: z.record(z.unknown()).optional(),
    capture: z.object({ trace: z.boolean().optional() }).strict().optional(),
    expect: expectationsSchema,
  })
  .strict();

export type ScenarioConfig = z.infer<typeof scenarioConfigSchema>;

function formatIssuePath(segments: ReadonlyArray<string | number>): string {
  let out = "";
  for (const seg of segments) {
    if (typeof seg === "number") out += `[${seg}]`;
    else out += out ? `.${seg}` : seg;
  }
  return out;
}

/**
 * Fail-fast runtime validation of parsed scenario JSON.
 * Throws with a readable error including the scenario path and the invalid field.
 */
export function validateScenarioConfig(raw: unknown, scenarioPath: string): ScenarioConfig {
  const parsed = scenarioConfigSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `'${formatIssuePath(issue.path)}' ` : "";
  throw new Error(`Scenario '${scenarioPath}': ${where}${issue?.message ?? "invalid scenario"}`);
}
