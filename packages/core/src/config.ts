/**
 * clite configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { LINT_CODES } from "./linter.js";

export const PROJECT_CONFIG_FILE = ".clite.json";

export const configSchema = z
  .object({
    version: z.literal(1, { errorMap: () => ({ message: "config 'version' must be 1" }) }),
    entry: z.string().min(1).optional(),
    maxDepth: z.number().int().positive().optional(),
    lint: z
      .object({
        disable: z.array(z.enum(LINT_CODES)).optional(),
        failOnWarn: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type CliteConfig = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: CliteConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

const DEFAULT_CONFIG: CliteConfig = {
  version: 1,
};

export class CliteConfigError extends Error {
  code = "E_CONFIG";
  path: string;

  constructor(filePath: string, message: string) {
    super(`Invalid config ${filePath}: ${message}`);
    this.name = "CliteConfigError";
    this.path = filePath;
  }
}

/**
 * Resolve the effective configuration.
 * Precedence: ./.clite.json > ~/.clite/config.json > defaults.
 * A file that exists but does not validate is an error, never skipped.
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".clite", "config.json");

  const projectConfig = loadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = loadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

/** Read and validate one config file; null when it does not exist. */
export function loadConfigFile(filePath: string): CliteConfig | null {
  if (!fs.existsSync(filePath)) return null;

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    throw new CliteConfigError(filePath, `cannot read file: ${e instanceof Error ? e.message : String(e)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new CliteConfigError(filePath, e instanceof Error ? e.message : String(e));
  }

  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new CliteConfigError(filePath, `${where}${issue?.message ?? "invalid shape"}`);
  }
  return parsed.data;
}
