/**
 * mathterm configuration loader.
 * Precedence: ./.mathtermrc.json > ~/.mathterm/config.json > defaults
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const grammarSchema = z.enum(["term", "bool", "list"]);

export const configSchema = z
  .object({
    version: z.number().int().positive().default(1),
    grammar: z.enum(["auto", "term", "bool", "list"]).default("auto"),
    fallback: z.array(grammarSchema).min(1, "fallback needs at least one grammar").default(["term", "bool", "list"]),
    notation: z.string().min(1).default("mathml"),
    indent: z.number().int().min(0).max(8).default(2),
  })
  .strict();

export type MathTermConfig = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: MathTermConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".mathtermrc.json";

export const DEFAULT_CONFIG: MathTermConfig = configSchema.parse({});

export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".mathterm", "config.json");

  // Try project-local config first
  const projectConfig = loadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  // Then user-level config
  const userConfig = loadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): MathTermConfig {
  return resolveConfig(cwd, homeDir).config;
}

/** Read and validate one config file; null when the file does not exist. */
export function loadConfigFile(filePath: string): MathTermConfig | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(filePath, msg);
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(filePath, msg);
  }
  return result.data;
}
