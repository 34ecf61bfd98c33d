// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Narrows parsed JSON into a FileConfig and collects every problem found,
 * so a broken config is reported in one go instead of one field at a time.
 */

import {
  ENV_ACTIVATION_POLICIES,
  type DependencyManagerSignature,
  type DiscoveryMode,
  type EnvActivationPolicy,
  type FileConfig,
} from './types.js';

/**
 * Result of checking one config file.
 */
export interface FileConfigValidation {
  config: FileConfig;
  problems: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnvActivationPolicy(value: unknown): value is EnvActivationPolicy {
  return ENV_ACTIVATION_POLICIES.some((policy) => policy === value);
}

function readStringArray(
  raw: Record<string, unknown>,
  key: string,
  problems: string[]
): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    problems.push(`${key} must be an array of strings`);
    return undefined;
  }
  const strings: string[] = [];
  value.forEach((item, index) => {
    if (typeof item === 'string') {
      strings.push(item);
    } else {
      problems.push(`${key}[${index}] must be a string`);
    }
  });
  return strings;
}

function readString(
  raw: Record<string, unknown>,
  key: string,
  problems: string[]
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    problems.push(`${key} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function readBoolean(
  raw: Record<string, unknown>,
  key: string,
  problems: string[]
): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    problems.push(`${key} must be true or false`);
    return undefined;
  }
  return value;
}

function readSignature(
  value: unknown,
  index: number,
  problems: string[]
): DependencyManagerSignature | undefined {
  const where = `dependencyManagers[${index}]`;
  if (!isRecord(value)) {
    problems.push(`${where} must be an object`);
    return undefined;
  }

  const before = problems.length;
  const name = readString(value, 'name', []);
  const marker = readString(value, 'marker', []);
  if (name === undefined) problems.push(`${where}.name must be a non-empty string`);
  if (marker === undefined) problems.push(`${where}.marker must be a non-empty string`);

  // null is accepted as "no activation", matching older configs
  const activation = typeof value.activation === 'string' ? value.activation : undefined;
  if (value.activation !== undefined && value.activation !== null && activation === undefined) {
    problems.push(`${where}.activation must be a string`);
  }
  const invocationPrefix = typeof value.invocationPrefix === 'string' ? value.invocationPrefix : undefined;
  if (value.invocationPrefix !== undefined && invocationPrefix === undefined) {
    problems.push(`${where}.invocationPrefix must be a string`);
  }

  const hasActivation = activation !== undefined && activation.trim() !== '';
  const hasPrefix = invocationPrefix !== undefined && invocationPrefix.trim() !== '';
  if (!hasActivation && !hasPrefix) {
    problems.push(`${where} needs either an activation command or a non-empty invocationPrefix`);
  }

  if (problems.length > before || name === undefined || marker === undefined) {
    return undefined;
  }

  const signature: DependencyManagerSignature = { name, marker };
  if (activation !== undefined && hasActivation) signature.activation = activation;
  if (invocationPrefix !== undefined && hasPrefix) signature.invocationPrefix = invocationPrefix;
  return signature;
}

/**
 * Validate a parsed config file. Unknown fields are ignored.
 */
export function validateFileConfig(raw: unknown): FileConfigValidation {
  const problems: string[] = [];
  const config: FileConfig = {};

  if (!isRecord(raw)) {
    return { config, problems: ['config must be a JSON object'] };
  }

  const defaultProjectsPaths = readStringArray(raw, 'defaultProjectsPaths', problems);
  if (defaultProjectsPaths) config.defaultProjectsPaths = defaultProjectsPaths;

  const projectPath = readString(raw, 'projectPath', problems);
  if (projectPath !== undefined) config.projectPath = projectPath;

  const multipleSubprojects = readBoolean(raw, 'multipleSubprojects', problems);
  if (multipleSubprojects !== undefined) config.multipleSubprojects = multipleSubprojects;

  const excludeDirs = readStringArray(raw, 'excludeDirs', problems);
  if (excludeDirs) config.excludeDirs = excludeDirs;

  const excludePrefixes = readStringArray(raw, 'excludePrefixes', problems);
  if (excludePrefixes) {
    excludePrefixes.forEach((prefix, index) => {
      if (prefix === '') {
        problems.push(`excludePrefixes[${index}] is empty and would exclude every directory`);
      }
    });
    config.excludePrefixes = excludePrefixes;
  }

  if (raw.dependencyManagers !== undefined) {
    if (!Array.isArray(raw.dependencyManagers)) {
      problems.push('dependencyManagers must be an array');
    } else {
      const signatures: DependencyManagerSignature[] = [];
      raw.dependencyManagers.forEach((item: unknown, index: number) => {
        const signature = readSignature(item, index, problems);
        if (signature) signatures.push(signature);
      });
      config.dependencyManagers = signatures;
    }
  }

  const customCommands = readStringArray(raw, 'customCommands', problems);
  if (customCommands) config.customCommands = customCommands;

  const editor = readString(raw, 'editor', problems);
  if (editor !== undefined) config.editor = editor;

  if (raw.envActivation !== undefined) {
    if (isEnvActivationPolicy(raw.envActivation)) {
      config.envActivation = raw.envActivation;
    } else {
      problems.push(`envActivation must be one of: ${ENV_ACTIVATION_POLICIES.join(', ')}`);
    }
  }

  const terminal = readString(raw, 'terminal', problems);
  if (terminal !== undefined) config.terminal = terminal;

  const autoRun = readBoolean(raw, 'autoRunCommandsInEnv', problems);
  if (autoRun !== undefined) config.autoRunCommandsInEnv = autoRun;

  const ask = readBoolean(raw, 'askForEnvActivation', problems);
  if (ask !== undefined) config.askForEnvActivation = ask;

  return { config, problems };
}

/**
 * Check the fields a discovery mode cannot run without.
 */
export function validateRequired(config: FileConfig, mode: DiscoveryMode): string[] {
  const problems: string[] = [];

  if (!config.editor) {
    problems.push('editor is required');
  }

  if (mode.kind === 'fuzzy') {
    if (!config.defaultProjectsPaths || config.defaultProjectsPaths.length === 0) {
      problems.push('defaultProjectsPaths must list at least one path for --find');
    }
  } else if (!config.projectPath) {
    problems.push(`projectPath is required for --profile ${mode.profile}`);
  }

  return problems;
}
