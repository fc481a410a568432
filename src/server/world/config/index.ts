import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { ConfigError, errorMessage } from "@shared/errors.js";
import { patrolConfigSchema } from "./types.js";
import type { PatrolConfig, PatrolConfigInput } from "./types.js";

export * from "./types.js";

export const DEFAULT_CONFIG_FILE = "config/patrol.json";

export interface LoadConfigOptions {
  /** Explicit file; must exist when given */
  path?: string;
  /** Directory relative paths are resolved against (defaults to cwd) */
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseConfig(input: unknown): PatrolConfig {
  const result = patrolConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export function defaultConfig(overrides: PatrolConfigInput = {}): PatrolConfig {
  return parseConfig(overrides);
}

/**
 * Load configuration from JSON. Falls back to defaults when no explicit
 * file was requested and the default one is absent.
 */
export function loadConfig(options: LoadConfigOptions = {}): PatrolConfig {
  const env = options.env ?? process.env;
  const baseDir = options.baseDir ?? process.cwd();
  const requested = options.path ?? env.PATROL_CONFIG;
  const file = resolve(baseDir, requested ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(file)) {
    if (requested) {
      throw new ConfigError(`Config file not found: ${file}`);
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read config ${file}: ${errorMessage(error)}`, { cause: error });
  }

  return parseConfig(raw);
}

export function resolveConfigPath(path: string, baseDir: string = process.cwd()): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}
