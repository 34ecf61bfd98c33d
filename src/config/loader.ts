// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading configuration files from disk.
 * Handles the global config and named profiles that override it.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CONFIG_DIR_ENV } from '../constants.js';
import { ConfigError } from '../errors.js';
import { logger } from '../logger.js';
import type { DiscoveryMode, FileConfig, ResolvedConfig } from './types.js';
import { mergeConfig, mergeFileConfigs, type CLIOptions } from './merger.js';
import { getExampleConfig, profileFileName } from './utils.js';
import { validateFileConfig } from './validator.js';

/**
 * Global config file name, inside the config directory.
 */
export const GLOBAL_CONFIG_FILE = 'config.json';

/**
 * Profiles directory name, inside the config directory.
 */
export const PROFILES_DIR = 'profiles';

/**
 * Default config directory path.
 */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.projload');

/**
 * Get the config directory: explicit override, then environment, then default.
 */
export function getConfigDir(overrideDir?: string): string {
  return overrideDir || process.env[CONFIG_DIR_ENV] || DEFAULT_CONFIG_DIR;
}

/**
 * Read and validate one config file.
 * Throws ConfigError on unreadable JSON or invalid fields.
 */
export function readConfigFile(configPath: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config: ${error instanceof Error ? error.message : String(error)}`,
      [],
      configPath
    );
  }

  const { config, problems } = validateFileConfig(raw);
  if (problems.length > 0) {
    throw new ConfigError('Invalid configuration', problems, configPath);
  }
  return config;
}

/**
 * Load the global configuration from <configDir>/config.json.
 * A missing file is not an error: a profile may supply everything.
 */
export function loadGlobalConfig(configDir: string = getConfigDir()): {
  config: FileConfig | null;
  configPath: string | null;
} {
  const configPath = path.join(configDir, GLOBAL_CONFIG_FILE);
  if (!fs.existsSync(configPath)) {
    logger.debug(`No global config at ${configPath}`);
    return { config: null, configPath: null };
  }
  return { config: readConfigFile(configPath), configPath };
}

/**
 * Load a named profile from <configDir>/profiles/<name>.json.
 */
export function loadProfileConfig(profile: string, configDir: string = getConfigDir()): {
  config: FileConfig;
  configPath: string;
} {
  const configPath = path.join(configDir, PROFILES_DIR, profileFileName(profile));
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Profile "${profile}" not found`, [], configPath);
  }
  return { config: readConfigFile(configPath), configPath };
}

/**
 * Load, merge and validate everything a run needs.
 */
export function loadConfig(
  mode: DiscoveryMode,
  cliOptions: CLIOptions = {},
  configDir: string = getConfigDir()
): ResolvedConfig {
  const { config: globalConfig, configPath } = loadGlobalConfig(configDir);
  if (configPath) {
    logger.debug(`Loaded global config from ${configPath}`);
  }

  let profileConfig: FileConfig | null = null;
  if (mode.kind === 'direct') {
    const profile = loadProfileConfig(mode.profile, configDir);
    logger.debug(`Loaded profile from ${profile.configPath}`);
    profileConfig = profile.config;
  }

  return mergeConfig(mergeFileConfigs(globalConfig, profileConfig), mode, cliOptions);
}

/**
 * Write an example global config if none exists yet.
 */
export function initConfig(configDir: string = getConfigDir()): {
  success: boolean;
  path: string;
  error?: string;
} {
  const configPath = path.join(configDir, GLOBAL_CONFIG_FILE);

  if (fs.existsSync(configPath)) {
    return {
      success: false,
      path: configPath,
      error: 'Config file already exists',
    };
  }

  try {
    fs.mkdirSync(path.join(configDir, PROFILES_DIR), { recursive: true });
    fs.writeFileSync(configPath, getExampleConfig());
    return { success: true, path: configPath };
  } catch (error) {
    return {
      success: false,
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
