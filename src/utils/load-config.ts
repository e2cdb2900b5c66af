/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { z } from "zod";
import { UnknownDialectError } from "./errors";
import type {
  ConfigError,
  PartialSummaryConfig,
  SummaryConfig,
} from "../types";
import { SummaryConfigSchema, PartialSummaryConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("book-summary", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/book-summary or ~/.config/book-summary
 * - macOS: ~/Library/Preferences/book-summary
 * - Windows: %APPDATA%\book-summary\Config
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<SummaryConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return SummaryConfigSchema.parse(JSON.parse(content));
}

/**
 * Read a partial config file
 * Throws if the file is unreadable, not JSON, or fails validation.
 * An unknown format raises UnknownDialectError so callers can treat it as fatal.
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialSummaryConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  const result = PartialSummaryConfigSchema.safeParse(parsed);

  if (result.success) {
    return result.data;
  }

  if (result.error.issues.some((issue) => issue.path[0] === "format")) {
    const { format } = z.looseObject({ format: z.unknown() }).parse(parsed);
    throw new UnknownDialectError(String(format));
  }

  throw result.error;
}

export function mergeConfig(
  base: SummaryConfig,
  override: PartialSummaryConfig,
): SummaryConfig {
  return {
    format: override.format ?? base.format,
    title: override.title ?? base.title,
    sort: override.sort ?? base.sort,
    output: override.output ?? base.output,
    directory: override.directory ?? base.directory,
    overwrite: override.overwrite ?? base.overwrite,
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: SummaryConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Invalid layers are skipped and reported, except for an unknown format
 *
 * @param userConfigPath - Overrides the OS-specific user config location
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      if (error instanceof UnknownDialectError) throw error;
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      if (error instanceof UnknownDialectError) throw error;
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
