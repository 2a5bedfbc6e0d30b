import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';
import stripJsonComments from 'strip-json-comments';
import { ConfigSchema, CONFIG_FILES, CONFIG_DEFAULTS, type Config } from '../config.js';
import { ConfigError, describeError } from '../errors.js';
import type { RegistryOverrides } from '../rules/registry.js';
import type { GlobalOptions, Severity } from '../types.js';

export interface LoadedConfig {
  /** Path to loaded config file, or null if using defaults */
  configPath: string | null;
  /** Parsed and validated config */
  config: Config;
}

/**
 * Find config file in project
 */
function findConfigFile(cwd: string): string | null {
  for (const file of CONFIG_FILES) {
    const filePath = path.join(cwd, file);
    if (existsSync(filePath)) {
      return filePath;
    }
  }
  return null;
}

/**
 * Parse JSONC file
 */
function parseJsonc(content: string): unknown {
  const stripped = stripJsonComments(content, { trailingCommas: true });
  return JSON.parse(stripped);
}

/**
 * Load config from an explicit path or the first config file found in cwd
 * @throws ConfigError when the file is missing, malformed or invalid
 */
export function loadConfig(cwd: string, explicitPath?: string): LoadedConfig {
  let configPath: string | null;
  if (explicitPath) {
    configPath = path.resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${explicitPath}`, { path: configPath });
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  if (!configPath) {
    // No config - caller uses defaults
    return {
      configPath: null,
      config: {},
    };
  }

  let parsed: unknown;
  try {
    parsed = parseJsonc(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config ${configPath}: ${describeError(error)}`, { path: configPath });
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${configPath}: ${issues}`, { path: configPath });
  }

  return {
    configPath,
    config: result.data,
  };
}

/**
 * Get resolved config values with defaults applied
 */
export function getConfigWithDefaults(config: Config): {
  include: string[];
  exclude: string[];
  failOn: Severity;
  concurrency: number | undefined;
  options: GlobalOptions;
} {
  return {
    include: config.include ?? CONFIG_DEFAULTS.include,
    exclude: config.exclude ?? CONFIG_DEFAULTS.exclude,
    failOn: config.failOn ?? CONFIG_DEFAULTS.failOn,
    concurrency: config.concurrency,
    options: {
      maxFixIterations: config.maxFixIterations ?? CONFIG_DEFAULTS.options.maxFixIterations,
      lineLength: config.lineLength ?? CONFIG_DEFAULTS.options.lineLength,
      indentWidth: config.indentWidth ?? CONFIG_DEFAULTS.options.indentWidth,
    },
  };
}

/**
 * The parts of a config the rule registry consumes
 */
export function toRegistryOverrides(config: Config, options: GlobalOptions): RegistryOverrides {
  return {
    rules: config.rules,
    categories: config.categories,
    options,
  };
}
