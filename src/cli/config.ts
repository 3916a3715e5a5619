/**
 * Config file loader for the csv2json CLI
 * Supports .csv2jsonrc (JSON) in current directory or parent directories
 */

import { existsSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { homedir } from "os";

export interface CLIConfig {
  hasHeader?: boolean;
  failFast?: boolean;
  maxLineLength?: number;
  stats?: boolean;
}

const CONFIG_FILENAMES = [".csv2jsonrc", ".csv2jsonrc.json", "csv2json.config.json"];

/**
 * Search for config file starting from the given directory,
 * walking up to parent directories and finally home directory.
 */
function findConfigFile(startDir: string = process.cwd(), homeDir: string = homedir()): string | null {
  let currentDir = startDir;

  // Walk up directory tree
  while (true) {
    for (const filename of CONFIG_FILENAMES) {
      const configPath = join(currentDir, filename);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) break;
    currentDir = parentDir;
  }

  // Check home directory
  const homeConfig = join(homeDir, ".csv2jsonrc");
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

/**
 * Keep the known, well-typed keys of a parsed config file.
 */
export function normalizeConfig(raw: unknown): CLIConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }

  const config: CLIConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const hasHeader = entries.get("hasHeader");
  if (typeof hasHeader === "boolean") config.hasHeader = hasHeader;

  const failFast = entries.get("failFast");
  if (typeof failFast === "boolean") config.failFast = failFast;

  const maxLineLength = entries.get("maxLineLength");
  if (typeof maxLineLength === "number" && Number.isInteger(maxLineLength) && maxLineLength >= 0) {
    config.maxLineLength = maxLineLength;
  }

  const stats = entries.get("stats");
  if (typeof stats === "boolean") config.stats = stats;

  return config;
}

/**
 * Load configuration from file.
 */
export function loadConfig(
  startDir?: string,
  homeDir?: string
): { config: CLIConfig; path: string | null } {
  const configPath = findConfigFile(startDir, homeDir);

  if (!configPath) {
    return { config: {}, path: null };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return { config: normalizeConfig(JSON.parse(content)), path: configPath };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Warning: Failed to parse config file ${configPath}: ${message}`);
    return { config: {}, path: configPath };
  }
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Merge configuration sources with proper precedence.
 * CLI args > environment variables > config file > defaults
 */
export function mergeConfig(
  cliArgs: Partial<CLIConfig>,
  fileConfig: CLIConfig,
  env: NodeJS.ProcessEnv = process.env
): CLIConfig {
  // Environment variable overrides
  const envConfig: Partial<CLIConfig> = {};

  if (env.CSV2JSON_HEADER !== undefined) {
    envConfig.hasHeader = isTruthy(env.CSV2JSON_HEADER);
  }
  if (env.CSV2JSON_FAILFAST !== undefined) {
    envConfig.failFast = isTruthy(env.CSV2JSON_FAILFAST);
  }
  if (env.CSV2JSON_MAX_LINE) {
    const max = parseInt(env.CSV2JSON_MAX_LINE, 10);
    if (!isNaN(max) && max >= 0) {
      envConfig.maxLineLength = max;
    }
  }

  // Merge with precedence: CLI > env > file > defaults
  return {
    ...getDefaults(),
    ...fileConfig,
    ...envConfig,
    ...definedOnly(cliArgs),
  };
}

/** Drop keys whose value is undefined so they don't mask lower sources */
function definedOnly(config: Partial<CLIConfig>): Partial<CLIConfig> {
  const out: Partial<CLIConfig> = {};
  if (config.hasHeader !== undefined) out.hasHeader = config.hasHeader;
  if (config.failFast !== undefined) out.failFast = config.failFast;
  if (config.maxLineLength !== undefined) out.maxLineLength = config.maxLineLength;
  if (config.stats !== undefined) out.stats = config.stats;
  return out;
}

/**
 * Get default configuration values.
 */
export function getDefaults(): CLIConfig {
  return {
    hasHeader: false,
    failFast: false,
    maxLineLength: 4096,
    stats: false,
  };
}
