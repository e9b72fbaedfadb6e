/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  LocalizerConfig,
  PartialLocalizerConfig,
} from "../types";
import {
  LocalizerConfigSchema,
  PartialLocalizerConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("md-localize", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/md-localize or ~/.config/md-localize
 * - macOS: ~/Library/Preferences/md-localize
 * - Windows: %APPDATA%\md-localize
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<LocalizerConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return LocalizerConfigSchema.parse(JSON.parse(content));
}

/**
 * Load user configuration from OS-specific directory
 * Throws if the file exists but is invalid
 */
async function loadUserConfig(): Promise<PartialLocalizerConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadCustomConfig(userConfigPath);
}

async function loadCustomConfig(
  configPath: string,
): Promise<PartialLocalizerConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialLocalizerConfigSchema.parse(JSON.parse(content));
}

/**
 * Merge a partial override into a full configuration, section by section
 */
export function mergeConfig(
  base: LocalizerConfig,
  override: PartialLocalizerConfig,
): LocalizerConfig {
  return {
    input: { ...base.input, ...override.input },
    images: { ...base.images, ...override.images },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: LocalizerConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load or validate is skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadCustomConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
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
