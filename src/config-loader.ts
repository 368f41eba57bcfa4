/**
 * Configuration loader
 * Uses cosmiconfig to search for configuration in various formats
 */

import { dirname, resolve } from 'path';
import { cosmiconfig } from 'cosmiconfig';
import { Ajv } from 'ajv';
import {
  type ArchitectConfig,
  type ArchitectConfigFile,
  architectConfigSchema,
  DEFAULT_CONFIG,
} from './config-schema.js';

/**
 * Module name for cosmiconfig (also the package.json field)
 */
const MODULE_NAME = 'architect';

/**
 * Configuration search locations (in priority order)
 */
const SEARCH_PLACES = [
  '.architectrc.json',
  '.architectrc',
  'architect.config.js',
  '.config/architect.json',
  'package.json',
];

/**
 * Key used when the configured API key variable is unset; local Ollama
 * ignores it, hosted endpoints reject it with AUTH
 */
export const FALLBACK_API_KEY = 'ollama';

const ajv = new Ajv({ allErrors: true, verbose: true });
const validateConfigFile = ajv.compile<ArchitectConfigFile>(architectConfigSchema);

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export interface LoadedConfig {
  config: ArchitectConfig;
  /** File the configuration came from, null when defaults were used */
  filepath: string | null;
}

export interface LoadConfigOptions {
  /** Directory where the upward search stops (defaults to the home directory) */
  stopDir?: string;
}

/**
 * Loads configuration from the filesystem, merged over defaults and then
 * overridden by environment variables
 *
 * @param searchFrom - Directory to start search from (defaults to cwd)
 * @throws {ConfigValidationError} If a config file exists but is invalid
 */
export async function loadConfig(
  searchFrom?: string,
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): Promise<LoadedConfig> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: SEARCH_PLACES,
    searchStrategy: 'global',
    stopDir: options.stopDir,
    cache: false,
  });

  const result = await explorer.search(searchFrom).catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError('Configuration file could not be read', [{ path: '(file)', message }]);
  });

  if (!result || result.isEmpty) {
    return { config: applyEnvOverrides(DEFAULT_CONFIG, env), filepath: null };
  }

  const fileConfig = validateAndNormalizeConfig(result.config, result.filepath);
  console.error(`⚙️ [CONFIG] Loaded ${result.filepath}`);

  return {
    config: applyEnvOverrides(mergeConfigs(DEFAULT_CONFIG, fileConfig), env),
    filepath: result.filepath,
  };
}

/**
 * Validates raw configuration using AJV
 *
 * @param filepath - Path to configuration file (for errors)
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateAndNormalizeConfig(config: unknown, filepath: string): ArchitectConfigFile {
  if (validateConfigFile(config)) {
    return config;
  }

  const errors = (validateConfigFile.errors ?? []).map((err) => ({
    path: err.instancePath || '(root)',
    message: err.message ?? 'Unknown error',
  }));

  throw new ConfigValidationError(`Invalid configuration in ${filepath}`, errors);
}

/**
 * Deep merges a file config over a base config
 */
export function mergeConfigs(base: ArchitectConfig, override: ArchitectConfigFile | null): ArchitectConfig {
  if (!override) return base;

  return {
    tokensFile: override.tokensFile ?? base.tokensFile,
    outputDir: override.outputDir ?? base.outputDir,
    colorPolicy: override.colorPolicy ?? base.colorPolicy,
    onPersistentFailure: override.onPersistentFailure ?? base.onPersistentFailure,
    formatOutput: override.formatOutput ?? base.formatOutput,
    sanitizer: { ...base.sanitizer, ...override.sanitizer },
    llm: { ...base.llm, ...override.llm },
  };
}

/**
 * Make `tokensFile` and `outputDir` absolute. Relative paths are read against
 * the directory of the config file that was found (it may sit in a parent
 * directory), or against `cwd` when only defaults apply.
 */
export function resolveConfigPaths(
  config: ArchitectConfig,
  filepath: string | null,
  cwd: string = process.cwd()
): ArchitectConfig {
  const base = filepath ? dirname(filepath) : cwd;
  return {
    ...config,
    tokensFile: resolve(base, config.tokensFile),
    outputDir: resolve(base, config.outputDir),
  };
}

/**
 * LLM_BASE_URL and LLM_MODEL win over any file value
 */
export function applyEnvOverrides(config: ArchitectConfig, env: NodeJS.ProcessEnv): ArchitectConfig {
  const baseUrl = env.LLM_BASE_URL?.trim();
  const model = env.LLM_MODEL?.trim();

  return {
    ...config,
    llm: {
      ...config.llm,
      ...(baseUrl ? { baseUrl } : {}),
      ...(model ? { model } : {}),
    },
  };
}

export function resolveApiKey(config: ArchitectConfig, env: NodeJS.ProcessEnv = process.env): string {
  const key = env[config.llm.apiKeyEnv]?.trim();
  return key || FALLBACK_API_KEY;
}

/**
 * Formats validation errors for user output
 */
export function formatConfigErrors(error: ConfigValidationError): string {
  const errorList = error.errors.map((err) => `  - ${err.path}: ${err.message}`).join('\n');

  return `${error.message}\n\nErrors:\n${errorList}`;
}
