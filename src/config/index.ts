// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (FileConfig, ResolvedConfig, signatures)
 * - loader.ts    - File I/O (global config, profiles, init)
 * - validator.ts - Narrowing parsed JSON and required-field checks
 * - merger.ts    - Config merging with priority handling
 * - utils.ts     - Utility functions
 */

export type {
  DependencyManagerSignature,
  DiscoveryMode,
  EnvActivationPolicy,
  FileConfig,
  ResolvedConfig,
} from './types.js';
export { ENV_ACTIVATION_POLICIES } from './types.js';

export {
  DEFAULT_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  PROFILES_DIR,
  getConfigDir,
  readConfigFile,
  loadGlobalConfig,
  loadProfileConfig,
  loadConfig,
  initConfig,
} from './loader.js';

export { validateFileConfig, validateRequired } from './validator.js';

export {
  DEFAULT_CONFIG,
  mergeConfig,
  mergeFileConfigs,
  normalizeLegacyActivation,
  resolveEnvActivation,
} from './merger.js';
export type { CLIOptions } from './merger.js';

export { expandHome, profileFileName, getExampleConfig } from './utils.js';
