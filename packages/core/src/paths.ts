import envPaths from "env-paths";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";

const APP_NAME = "conkit";

/**
 * Resolve paths with XDG override support.
 *
 * On macOS, env-paths uses native Apple paths (~/Library/...) by default,
 * ignoring XDG environment variables. An explicitly set XDG_CONFIG_HOME wins.
 */
function resolveConfigDir(): string {
  const defaults = envPaths(APP_NAME, { suffix: "" });

  if (process.platform !== "darwin") {
    return defaults.config;
  }

  const xdgConfig = process.env["XDG_CONFIG_HOME"];
  return xdgConfig ? join(xdgConfig, APP_NAME) : defaults.config;
}

const configDir = resolveConfigDir();

export const PATHS = {
  /** Config directory (~/.config/conkit) */
  config: configDir,

  /** User config file */
  configFile: join(configDir, "config.toml"),
};

export const PROJECT_CONFIG_FILENAME = ".conkit.toml";

export async function ensureConfigDir(): Promise<void> {
  await mkdir(PATHS.config, { recursive: true });
}
