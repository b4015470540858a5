/**
 * Configuration loader
 *
 * Merges, from highest to lowest precedence:
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import { DEFAULT_EXTENSIONS, DEFAULT_IGNORE } from '../api/batch.js';
import { DEFAULT_MAX_PASSES } from '../migration/driver.js';
import { ConfigError } from '../migration/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { fileConfigSchema, type CliConfigOverrides, type FixConfig, type PartialFixConfig } from './types.js';

/**
 * Configuration file names searched for in the working directory
 */
export const CONFIG_FILE_NAMES = ['tsfix.config.yaml', 'tsfix.config.yml'];

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'TSFIX_';

export function getDefaultConfig(): FixConfig {
  return {
    extensions: [...DEFAULT_EXTENSIONS],
    ignore: [...DEFAULT_IGNORE],
    maxPasses: DEFAULT_MAX_PASSES,
  };
}

/**
 * Split a comma-separated list, dropping blanks.
 */
export function parseNameList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(value: string, source: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ConfigError(`expected a positive integer, got "${value}"`, source);
  }
  return parsed;
}

/**
 * Read and validate a config file.
 *
 * @throws ConfigError if the file cannot be read, is not YAML, or has unknown or mistyped keys
 */
export function loadConfigFile(filePath: string): PartialFixConfig {
  let raw: unknown;
  try {
    raw = YAML.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(getErrorMessage(error), filePath);
  }

  // An empty file is an empty config
  if (raw === undefined || raw === null) return {};

  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(issues.join('; '), filePath);
  }
  return result.data;
}

/**
 * Locate the config file: the explicit path, or the first known name in `cwd`.
 */
export function findConfigFile(configPath: string | undefined, cwd: string): string | undefined {
  if (configPath) {
    const absolutePath = path.resolve(cwd, configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError('config file not found', absolutePath);
    }
    return absolutePath;
  }
  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = path.join(cwd, fileName);
    if (fs.existsSync(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Configuration from `TSFIX_FIXES` and `TSFIX_MAX_PASSES`.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialFixConfig {
  const config: PartialFixConfig = {};

  const fixes = env[`${ENV_PREFIX}FIXES`];
  if (fixes) config.fixes = parseNameList(fixes);

  const maxPasses = env[`${ENV_PREFIX}MAX_PASSES`];
  if (maxPasses) config.maxPasses = parsePositiveInt(maxPasses, `${ENV_PREFIX}MAX_PASSES`);

  return config;
}

function mergeConfig(base: FixConfig, override: PartialFixConfig): FixConfig {
  return {
    fixes: override.fixes ?? base.fixes,
    extensions: override.extensions ?? base.extensions,
    ignore: override.ignore ? [...base.ignore, ...override.ignore] : base.ignore,
    maxPasses: override.maxPasses ?? base.maxPasses,
  };
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the configuration for one run.
 *
 * @throws ConfigError
 */
export function loadConfig(cliOverrides: CliConfigOverrides = {}, options: LoadConfigOptions = {}): FixConfig {
  const cwd = options.cwd ?? process.cwd();
  let config = getDefaultConfig();

  const configFile = findConfigFile(options.configPath, cwd);
  if (configFile) {
    config = mergeConfig(config, loadConfigFile(configFile));
  }

  config = mergeConfig(config, loadEnvConfig(options.env));

  return mergeConfig(config, {
    fixes: cliOverrides.fixes,
    maxPasses: cliOverrides.maxPasses,
  });
}
