import { silentLogger, type Logger } from "@conkit/shared";
import { access, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { ConfigError } from "./errors";
import { PATHS, PROJECT_CONFIG_FILENAME } from "./paths";
import {
  ConkitConfigSchema,
  DEFAULT_CONFIG,
  type ConkitConfig,
} from "./schema/config";

// --------------------------------------------------------------------------
// Environment variable overrides
// --------------------------------------------------------------------------

type EnvParser<T> = (value: string) => T;

const parseEnvBoolean: EnvParser<boolean> = (value) => {
  const lower = value.toLowerCase();
  return lower === "true" || lower === "1";
};

// Non-numeric values pass through untouched so validation reports them
const parseEnvInteger: EnvParser<number | string> = (value) => {
  const num = Number.parseInt(value, 10);
  return Number.isNaN(num) ? value : num;
};

const parseEnvString: EnvParser<string> = (value) => value;

interface EnvMapping {
  path: string[];
  parse: EnvParser<unknown>;
}

/**
 * Mapping of environment variable names to config paths and parsers.
 *
 * Naming convention: CONKIT_{SECTION}_{KEY} (all uppercase, underscores)
 *
 * Precedence (highest to lowest):
 * 1. Environment variables
 * 2. Project config (.conkit.toml)
 * 3. User config (~/.config/conkit/config.toml)
 * 4. Schema defaults
 */
const ENV_MAP: Record<string, EnvMapping> = {
  CONKIT_LAYOUT_FALLBACK_WIDTH: {
    path: ["layout", "fallback_width"],
    parse: parseEnvInteger,
  },
  CONKIT_LAYOUT_TABLE_MODE: {
    path: ["layout", "table_mode"],
    parse: parseEnvBoolean,
  },
  CONKIT_WAIT_MESSAGE: { path: ["wait", "message"], parse: parseEnvString },
  CONKIT_WAIT_POLL_INTERVAL_MS: {
    path: ["wait", "poll_interval_ms"],
    parse: parseEnvInteger,
  },
  CONKIT_WAIT_SHOW_DOTS: {
    path: ["wait", "show_dots"],
    parse: parseEnvBoolean,
  },
  CONKIT_OUTPUT_COLOR: { path: ["output", "color"], parse: parseEnvString },
  CONKIT_LOG_LEVEL: { path: ["log", "level"], parse: parseEnvString },
};

/**
 * Apply environment variable overrides to config.
 * Env vars take precedence over file-based config.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  for (const [envKey, { path, parse }] of Object.entries(ENV_MAP)) {
    const value = env[envKey];
    if (value !== undefined) {
      setNestedValue(config, path, parse(value));
    }
  }
  return config;
}

export interface ConfigPaths {
  user: string;
  project?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Throw ConfigError instead of falling back to defaults. */
  strict?: boolean;
  logger?: Logger;
}

/**
 * Load configuration: defaults, then the user file, then the project file,
 * then environment overrides.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<ConkitConfig> {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? silentLogger;
  const paths = await getConfigPaths(cwd);
  const userConfig = await readConfigFile(paths.user);
  const projectConfig = paths.project
    ? await readConfigFile(paths.project)
    : null;

  const merged = mergeDeep(
    mergeDeep({}, userConfig ?? {}),
    projectConfig ?? {}
  );
  const withEnv = applyEnvOverrides(merged, options.env ?? process.env);

  const result = ConkitConfigSchema.safeParse(withEnv);
  if (result.success) {
    return result.data;
  }

  const error = new ConfigError({
    message: `Invalid configuration: ${result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ")}`,
    issues: result.error.issues,
    path: paths.project ?? paths.user,
  });
  if (options.strict) {
    throw error;
  }
  logger.warn("Failed to parse config, using defaults", {
    error: error.message,
  });
  return DEFAULT_CONFIG;
}

/**
 * Minimal TOML reader for the flat config files: `[section]` headers and
 * `key = value` pairs with string, number and boolean values.
 */
export function parseConfigText(text: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let currentSection: string[] = [];

  for (const line of text.split("\n")) {
    const trimmed = stripInlineComment(line.trim());
    if (trimmed === "") {
      continue;
    }

    // Section header
    if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
      currentSection = trimmed
        .slice(1, -1)
        .split(".")
        .map((part) => part.trim())
        .filter(Boolean);
      continue;
    }

    const match = trimmed.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.+)$/);
    const key = match?.[1];
    const rawValue = match?.[2];
    if (!key || !rawValue) {
      continue;
    }

    const path = [...currentSection, ...key.split(".")].filter(Boolean);
    setNestedValue(result, path, parseValue(rawValue.trim()));
  }

  return result;
}

async function readConfigFile(
  path: string
): Promise<Record<string, unknown> | null> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new ConfigError({
      message: `Cannot read config file ${path}`,
      path,
      cause: error,
    });
  }
  return parseConfigText(text);
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isMissingFile(error)) {
      return false;
    }
    throw error;
  }
}

async function findFileUp(
  filename: string,
  startDir: string
): Promise<string | null> {
  let dir = startDir;

  for (;;) {
    const filePath = join(dir, filename);
    if (await fileExists(filePath)) {
      return filePath;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export async function findProjectConfigPath(
  cwd: string = process.cwd()
): Promise<string | null> {
  return findFileUp(PROJECT_CONFIG_FILENAME, cwd);
}

export async function getConfigPaths(
  cwd: string = process.cwd()
): Promise<ConfigPaths> {
  const project = await findProjectConfigPath(cwd);
  return {
    user: PATHS.configFile,
    ...(project ? { project } : {}),
  };
}

/**
 * Parse a TOML value.
 */
function parseValue(value: string): unknown {
  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }

  if (/^-?\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  if (/^-?\d+\.\d+$/.test(value)) {
    return Number.parseFloat(value);
  }

  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return parseBasicString(value);
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }

  // Bare string
  return value;
}

function parseBasicString(value: string): string {
  try {
    const parsed: unknown = JSON.parse(value);
    return typeof parsed === "string" ? parsed : value.slice(1, -1);
  } catch {
    // Escapes JSON does not know (\e, \U...) are kept verbatim
    return value.slice(1, -1);
  }
}

function stripInlineComment(value: string): string {
  let inQuote = false;
  let quoteChar = "";
  let escapeNext = false;

  for (let i = 0; i < value.length; i += 1) {
    const char = value[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }

    if (char === "\\") {
      escapeNext = true;
      continue;
    }

    if ((char === '"' || char === "'") && !inQuote) {
      inQuote = true;
      quoteChar = char;
      continue;
    }

    if (inQuote && char === quoteChar) {
      inQuote = false;
      continue;
    }

    if (!inQuote && char === "#") {
      return value.slice(0, i).trim();
    }
  }

  return value.trim();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(
  target: Record<string, unknown>,
  path: string[],
  value: unknown
): void {
  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < path.length; i += 1) {
    const key = path[i];
    if (!key) {
      continue;
    }
    if (i === path.length - 1) {
      cursor[key] = value;
      return;
    }
    const existing = cursor[key];
    if (isPlainObject(existing)) {
      cursor = existing;
      continue;
    }
    const next: Record<string, unknown> = {};
    cursor[key] = next;
    cursor = next;
  }
}

function mergeDeep(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      result[key] = mergeDeep(existing, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function serializeValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Serialize a config object back to the TOML subset `parseConfigText` reads.
 */
export function serializeConfigObject(config: Record<string, unknown>): string {
  const lines: string[] = [];
  const sections: Array<[string, Record<string, unknown>]> = [];

  for (const [key, value] of Object.entries(config)) {
    if (isPlainObject(value)) {
      sections.push([key, value]);
    } else if (value !== undefined) {
      lines.push(`${key} = ${serializeValue(value)}`);
    }
  }

  for (const [name, section] of sections) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(`[${name}]`);
    for (const [key, value] of Object.entries(section)) {
      if (value !== undefined) {
        lines.push(`${key} = ${serializeValue(value)}`);
      }
    }
  }

  return `${lines.join("\n")}\n`;
}
