/**
 * Scenario discovery and filtering helpers.
 */
import * as fs from "node:fs";
import * as path from "node:path";

export interface DiscoveredScenario {
  id: string;
  dir: string;
  relPath: string;
  root: string;
}

export const SCENARIO_FILE = "scenario.json";

const IGNORED_DIRS = new Set(["node_modules", "dist"]);

function walkForScenarios(dir: string, root: string, seen: Map<string, DiscoveredScenario>): void {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isDirectory() || IGNORED_DIRS.has(entry.name) || entry.name.startsWith(".")) {
      continue;
    }

    const fullPath = path.join(dir, entry.name);
    // First root wins for a repeated id.
    if (fs.existsSync(path.join(fullPath, SCENARIO_FILE)) && !seen.has(entry.name)) {
      seen.set(entry.name, {
        id: entry.name,
        dir: fullPath,
        relPath: path.relative(root, fullPath),
        root,
      });
    }

    walkForScenarios(fullPath, root, seen);
  }
}

/**
 * The bundled scenario directory, followed by any extra roots listed in
 * `extraRootsEnv` (separated by the platform path delimiter).
 */
export function getScenarioRoots(repoRoot: string, extraRootsEnv?: string): string[] {
  const roots = [path.join(repoRoot, "packages", "scenarios", "scenarios")];

  for (const raw of (extraRootsEnv ?? "").split(path.delimiter)) {
    const s = raw.trim();
    if (s) roots.push(path.resolve(repoRoot, s));
  }

  return [...new Set(roots.map((r) => path.resolve(r)))];
}

export function discoverScenarios(roots: string[]): DiscoveredScenario[] {
  const seen = new Map<string, DiscoveredScenario>();
  for (const root of roots) {
    if (fs.existsSync(root)) walkForScenarios(root, root, seen);
  }
  return [...seen.values()].sort((a, b) => a.relPath.localeCompare(b.relPath));
}

export function applyScenarioTextFilter(
  scenarios: DiscoveredScenario[],
  filterText?: string
): DiscoveredScenario[] {
  const q = (filterText ?? "").trim().toLowerCase();
  if (!q) return scenarios;
  return scenarios.filter((s) => s.id.toLowerCase().includes(q) || s.relPath.toLowerCase().includes(q));
}

/** Split a comma-separated tag list into unique lower-case tags. */
export function parseTagFilter(tagFilter?: string): string[] {
  const tags = (tagFilter ?? "")
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter((t) => t.length > 0);
  return [...new Set(tags)];
}

export function hasAnyRequestedTag(scenarioTags: string[] | undefined, requestedTags: string[]): boolean {
  if (requestedTags.length === 0) return true;
  const normalized = new Set((scenarioTags ?? []).map((t) => t.toLowerCase()));
  return requestedTags.some((tag) => normalized.has(tag));
}
