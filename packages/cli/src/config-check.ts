/**
 * Config validation and initialization behind `config validate` and `config init`
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { Errors } from '@nanobot-launcher/core';
import {
  createDefaultConfig,
  getConfigPath,
  saveConfig,
  validateSources,
  type LoadConfigOptions,
  type SourceValidation,
} from '@nanobot-launcher/config';

export interface ConfigCheck extends SourceValidation {
  /** 0 when every present source is valid, 1 otherwise */
  exitCode: number;
}

export function checkConfig(
  options: Pick<LoadConfigOptions, 'env' | 'configPath' | 'cwd' | 'home'> = {}
): ConfigCheck {
  const result = validateSources(options);
  return { ...result, exitCode: result.issues.length > 0 ? 1 : 0 };
}

export interface InitConfigOptions {
  /** Target file (default: ~/.nanobot/config.json) */
  path?: string;
  /** Overwrite an existing file */
  force?: boolean;
  cwd?: string;
  home?: string;
}

/**
 * Write the default configuration and return the path written
 */
export function initConfig(options: InitConfigOptions = {}): string {
  const path = options.path
    ? resolve(options.cwd ?? process.cwd(), options.path)
    : getConfigPath(options.home);

  if (existsSync(path) && !options.force) {
    throw Errors.configExists(path);
  }

  saveConfig(createDefaultConfig(), path);
  return path;
}
