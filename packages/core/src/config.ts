/**
 * minasm configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { DEFAULT_MAX_STEPS } from "./evaluator.js";
import { MAX_EXTENSION_LEVEL } from "./recognizer.js";

const configSchema = z
  .object({
    extensionLevel: z.number().int().min(-1).max(MAX_EXTENSION_LEVEL).optional(),
    maxSteps: z.number().int().nonnegative().optional(),
    uninitialized: z.enum(["strict", "permissive"]).optional(),
    strictBindings: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configSchema>;
export type Config = Required<ConfigFile>;

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
}

export const DEFAULT_CONFIG: Config = {
  extensionLevel: -1,
  maxSteps: DEFAULT_MAX_STEPS,
  uninitialized: "strict",
  strictBindings: false,
};

export class MinasmConfigError extends Error {
  diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "MinasmConfigError";
    this.diagnostic = diagnostic;
  }
}

/**
 * Load configuration from project or user config.
 * Precedence: ./.minasmrc.json > ~/.minasm/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".minasmrc.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".minasm", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): Config {
  return resolveConfig(cwd, homeDir).config;
}

function configError(filePath: string, message: string): MinasmConfigError {
  return new MinasmConfigError(
    makeDiag(
      "E_CONFIG",
      `Invalid config file ${filePath}: ${message}`,
      undefined,
      "Allowed keys: extensionLevel, maxSteps, uninitialized, strictBindings."
    )
  );
}

function tryLoadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw configError(filePath, e instanceof Error ? e.message : String(e));
  }

  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw configError(filePath, `${where}${issue.message}`);
  }
  return { ...DEFAULT_CONFIG, ...parsed.data };
}
