// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Merges the global config, an optional profile and CLI options.
 * Priority: CLI options > profile > global config > defaults
 */

import { ConfigError } from '../errors.js';
import { DEFAULT_TERMINAL, INLINE_TERMINAL } from '../constants.js';
import type {
  DiscoveryMode,
  EnvActivationPolicy,
  FileConfig,
  ResolvedConfig,
} from './types.js';
import { expandHome } from './utils.js';
import { validateRequired } from './validator.js';

/**
 * CLI options that override file configuration.
 */
export interface CLIOptions {
  terminal?: string;
  inline?: boolean;
}

/** Default values for every optional field */
export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'editor' | 'projectPath' | 'defaultProjectsPaths'> = {
  multipleSubprojects: true,
  excludeDirs: [],
  excludePrefixes: [],
  dependencyManagers: [],
  customCommands: [],
  envActivation: 'skip',
  terminal: DEFAULT_TERMINAL,
};

/**
 * Replace the older boolean activation flags of one file with the
 * envActivation they stand for. Auto wins over ask; an explicit
 * envActivation wins over both.
 */
export function normalizeLegacyActivation(config: FileConfig): FileConfig {
  const { autoRunCommandsInEnv, askForEnvActivation, ...rest } = config;
  if (rest.envActivation) return rest;
  if (autoRunCommandsInEnv) return { ...rest, envActivation: 'auto' };
  if (askForEnvActivation) return { ...rest, envActivation: 'ask' };
  return rest;
}

/**
 * Overlay a profile on the global config, field by field.
 * Fields absent from the profile keep their global value. Each file's
 * legacy activation flags are resolved before the overlay.
 */
export function mergeFileConfigs(globalConfig: FileConfig | null, profileConfig: FileConfig | null): FileConfig {
  const merged: FileConfig = globalConfig ? normalizeLegacyActivation(globalConfig) : {};
  if (profileConfig) {
    for (const [key, value] of Object.entries(normalizeLegacyActivation(profileConfig))) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

/**
 * Resolve the activation policy, honouring the older boolean flags
 * when envActivation is not set. Auto wins over ask.
 */
export function resolveEnvActivation(config: FileConfig): EnvActivationPolicy {
  if (config.envActivation) return config.envActivation;
  if (config.autoRunCommandsInEnv) return 'auto';
  if (config.askForEnvActivation) return 'ask';
  return DEFAULT_CONFIG.envActivation;
}

/**
 * Produce the read-only configuration for one run.
 * Throws ConfigError if a field required by the discovery mode is missing.
 */
export function mergeConfig(
  fileConfig: FileConfig,
  mode: DiscoveryMode,
  cliOptions: CLIOptions = {},
  home?: string
): ResolvedConfig {
  const problems = validateRequired(fileConfig, mode);
  if (problems.length > 0 || !fileConfig.editor) {
    throw new ConfigError('Invalid configuration', problems);
  }

  let terminal = fileConfig.terminal ?? DEFAULT_CONFIG.terminal;
  if (cliOptions.terminal) terminal = cliOptions.terminal;
  if (cliOptions.inline) terminal = INLINE_TERMINAL;

  const config: ResolvedConfig = {
    defaultProjectsPaths: (fileConfig.defaultProjectsPaths ?? []).map((p) => expandHome(p, home)),
    projectPath: fileConfig.projectPath ? expandHome(fileConfig.projectPath, home) : null,
    multipleSubprojects: fileConfig.multipleSubprojects ?? DEFAULT_CONFIG.multipleSubprojects,
    excludeDirs: [...(fileConfig.excludeDirs ?? DEFAULT_CONFIG.excludeDirs)],
    excludePrefixes: [...(fileConfig.excludePrefixes ?? DEFAULT_CONFIG.excludePrefixes)],
    dependencyManagers: (fileConfig.dependencyManagers ?? DEFAULT_CONFIG.dependencyManagers).map(
      (signature) => ({ ...signature })
    ),
    customCommands: [...(fileConfig.customCommands ?? DEFAULT_CONFIG.customCommands)],
    editor: fileConfig.editor,
    envActivation: resolveEnvActivation(fileConfig),
    terminal,
  };

  return Object.freeze(config);
}
