/**
 * Gateway configuration loading
 *
 * Resolution order:
 * 1. NANOBOT_CONFIG environment variable (JSON text)
 * 2. Explicit config path, or ~/.nanobot/config.json then ./config.json
 * 3. Defaults
 *
 * A source that fails to parse or validate is reported and skipped.
 * Flat environment overrides are applied to whichever config wins.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import {
  CONFIG_FILE_NAME,
  DATA_DIR_NAME,
  Errors,
  LAUNCHER_ENV,
  convertToCamel,
  formatError,
  formatValidationErrors,
  isPlainObject,
  silentLogger,
  validateSchema,
  type Logger,
} from '@nanobot-launcher/core';
import { migrateConfig } from './migrate.js';
import { applyEnvOverrides } from './overrides.js';
import { createDefaultConfig, gatewayConfigSchema, type GatewayConfig } from './schema.js';

export type ConfigSource =
  | { kind: 'env'; name: string }
  | { kind: 'file'; path: string }
  | { kind: 'defaults' };

export interface LoadConfigOptions {
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Explicit config file; replaces the default file locations */
  configPath?: string;
  /** Working directory for ./config.json (default: process.cwd()) */
  cwd?: string;
  /** Home directory (default: os.homedir()) */
  home?: string;
  /** Receives a warning for every skipped source */
  logger?: Logger;
}

export interface LoadedConfig {
  config: GatewayConfig;
  source: ConfigSource;
  /** Sources that were present but rejected */
  issues: ConfigIssue[];
}

export interface ConfigIssue {
  source: ConfigSource;
  message: string;
}

/**
 * Default configuration file path
 */
export function getConfigPath(home: string = homedir()): string {
  return join(home, DATA_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Gateway data directory
 */
export function getDataDir(home: string = homedir()): string {
  return join(home, DATA_DIR_NAME);
}

/**
 * Parse and validate config JSON text. Accepts camelCase or snake_case keys.
 */
export function parseConfigJson(text: string, sourceLabel: string): GatewayConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw Errors.configParseFailed(sourceLabel, error instanceof Error ? error : undefined);
  }
  return parseConfigData(raw, sourceLabel);
}

/**
 * Validate an already-decoded config object
 */
export function parseConfigData(raw: unknown, sourceLabel: string): GatewayConfig {
  const camel = convertToCamel(raw);
  if (!isPlainObject(camel)) {
    throw Errors.invalidConfig(`Config from ${sourceLabel} must be a JSON object`, { source: sourceLabel });
  }

  const result = validateSchema(gatewayConfigSchema, migrateConfig(camel));
  if (!result.success || !result.data) {
    const problems = formatValidationErrors(result.errors ?? []);
    throw Errors.invalidConfig(`Invalid config from ${sourceLabel}: ${problems.join('; ')}`, {
      source: sourceLabel,
      problems,
    });
  }
  return result.data;
}

export function describeSource(source: ConfigSource): string {
  switch (source.kind) {
    case 'env': return `$${source.name}`;
    case 'file': return source.path;
    case 'defaults': return 'defaults';
  }
}

/**
 * Candidate config files, in priority order
 */
export function configFileCandidates(options: Pick<LoadConfigOptions, 'configPath' | 'cwd' | 'home'> = {}): string[] {
  if (options.configPath) {
    return [resolve(options.cwd ?? process.cwd(), options.configPath)];
  }
  return [
    getConfigPath(options.home),
    resolve(options.cwd ?? process.cwd(), CONFIG_FILE_NAME),
  ];
}

/**
 * Load configuration from environment variable, file, or defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const logger = options.logger ?? silentLogger;
  const issues: ConfigIssue[] = [];

  const reject = (source: ConfigSource, error: unknown): void => {
    const message = formatError(error);
    issues.push({ source, message });
    logger.warn(`Failed to load config from ${describeSource(source)}: ${message}`);
  };

  let loaded: { config: GatewayConfig; source: ConfigSource } | undefined;

  const envText = env[LAUNCHER_ENV.CONFIG];
  if (envText) {
    const source: ConfigSource = { kind: 'env', name: LAUNCHER_ENV.CONFIG };
    try {
      loaded = { config: parseConfigJson(envText, describeSource(source)), source };
    } catch (error) {
      reject(source, error);
    }
  }

  if (!loaded) {
    for (const path of configFileCandidates(options)) {
      if (!existsSync(path)) continue;

      const source: ConfigSource = { kind: 'file', path };
      try {
        loaded = { config: parseConfigJson(readFileSync(path, 'utf-8'), path), source };
        break;
      } catch (error) {
        reject(source, error);
      }
    }
  }

  const base: { config: GatewayConfig; source: ConfigSource } =
    loaded ?? { config: createDefaultConfig(), source: { kind: 'defaults' } };
  logger.debug('Resolved gateway config', { source: describeSource(base.source) });

  return {
    config: applyEnvOverrides(base.config, env),
    source: base.source,
    issues,
  };
}

export interface SourceValidation {
  /** Every source that was present, in priority order */
  checked: ConfigSource[];
  /** Sources that failed to parse or validate */
  issues: ConfigIssue[];
}

/**
 * Check every present config source, not only the one that would win
 */
export function validateSources(
  options: Pick<LoadConfigOptions, 'env' | 'configPath' | 'cwd' | 'home'> = {}
): SourceValidation {
  const env = options.env ?? process.env;
  const checked: ConfigSource[] = [];
  const issues: ConfigIssue[] = [];

  const check = (source: ConfigSource, read: () => string): void => {
    checked.push(source);
    try {
      parseConfigJson(read(), describeSource(source));
    } catch (error) {
      issues.push({ source, message: formatError(error) });
    }
  };

  const envText = env[LAUNCHER_ENV.CONFIG];
  if (envText) {
    check({ kind: 'env', name: LAUNCHER_ENV.CONFIG }, () => envText);
  }

  for (const path of configFileCandidates(options)) {
    if (existsSync(path)) {
      check({ kind: 'file', path }, () => readFileSync(path, 'utf-8'));
    }
  }

  return { checked, issues };
}

/**
 * Save configuration as camelCase JSON
 */
export function saveConfig(config: GatewayConfig, configPath: string = getConfigPath()): void {
  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw Errors.storageError(
      `Failed to write config to ${configPath}`,
      error instanceof Error ? error : undefined
    );
  }
}
