/**
 * Shared assertion helpers for scenario runner tests.
 */
import * as assert from "node:assert/strict";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function describeKind(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * First place where `actual` fails to contain `subset`, or null.
 * Objects may carry extra keys; arrays match on their prefix.
 */
export function findSubsetMismatch(actual: unknown, subset: unknown, at = "$"): string | null {
  if (Array.isArray(subset)) {
    if (!Array.isArray(actual)) return `${at}: expected array but got ${describeKind(actual)}`;
    if (actual.length < subset.length) {
      return `${at}: expected at least ${subset.length} items but got ${actual.length}`;
    }
    for (const [i, item] of subset.entries()) {
      const mismatch = findSubsetMismatch(actual[i], item, `${at}[${i}]`);
      if (mismatch) return mismatch;
    }
    return null;
  }

  if (isRecord(subset)) {
    if (!isRecord(actual)) return `${at}: expected object but got ${describeKind(actual)}`;
    for (const [key, expected] of Object.entries(subset)) {
      if (!Object.hasOwn(actual, key)) return `${at}.${key}: key missing`;
      const mismatch = findSubsetMismatch(actual[key], expected, `${at}.${key}`);
      if (mismatch) return mismatch;
    }
    return null;
  }

  if (!Object.is(actual, subset)) {
    return `${at}: expected ${JSON.stringify(subset)} but got ${JSON.stringify(actual)}`;
  }
  return null;
}

export function assertJsonSubset(actual: unknown, subset: unknown, label: string): void {
  const mismatch = findSubsetMismatch(actual, subset);
  if (mismatch) {
    assert.fail(`${label}: JSON subset mismatch at ${mismatch}`);
  }
}

export function parseJsonOutput(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    assert.fail(`${label}: output is not JSON (${msg}): ${text}`);
  }
}

export function assertMatchesRegex(text: string, pattern: string, label: string): void {
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    assert.fail(`${label}: invalid regex '${pattern}': ${msg}`);
    return;
  }

  assert.ok(re.test(text), `${label}: text did not match regex '${pattern}'. Actual: ${text}`);
}
