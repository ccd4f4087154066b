/**
 * sublisp configuration loading.
 * Precedence: ./.sublisprc.json > ~/.sublisp/config.json > defaults
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";

export const BINDINGS = ["reader", "prelude", "none"] as const;
export type Binding = (typeof BINDINGS)[number];

export const DEFAULT_MAX_STEPS = 1_000_000;

export const configSchema = z
  .object({
    version: z.literal(1).default(1),
    maxSteps: z
      .number({ invalid_type_error: "maxSteps must be a number" })
      .int("maxSteps must be an integer")
      .positive("maxSteps must be positive")
      .default(DEFAULT_MAX_STEPS),
    binding: z.enum(BINDINGS).default("reader"),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export type ConfigSource = "project" | "user" | "default";

export interface ResolvedConfig {
  config: Config;
  source: ConfigSource;
  path: string | null;
}

export const DEFAULT_CONFIG: Config = { version: 1, maxSteps: DEFAULT_MAX_STEPS, binding: "reader" };

export class ConfigError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".sublisprc.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".sublisp", "config.json");

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

/**
 * Missing files yield null; unreadable or invalid ones throw a ConfigError.
 */
function tryLoadConfigFile(filePath: string): Config | null {
  if (!fs.existsSync(filePath)) return null;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Cannot read config file: ${msg}`, filePath);
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config file: ${issues}`, filePath);
  }
  return result.data;
}
