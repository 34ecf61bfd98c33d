// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Launcher run: config → selection → detection → command plan → terminal.
 *
 * Each step only runs if the previous one produced a value; a cancelled
 * selection or activation prompt ends the run with nothing spawned.
 */

import chalk from 'chalk';
import {
  getConfigDir,
  loadConfig,
  type CLIOptions,
  type DiscoveryMode,
  type ResolvedConfig,
} from './config/index.js';
import { EXIT_CODES, type ExitCode } from './constants.js';
import { detectDependencyManager, editorCommand, planCommands, type CommandPlan } from './environment/index.js';
import { ConfigError, TerminalLaunchError } from './errors.js';
import type { InterruptHandler } from './interrupt.js';
import { logger } from './logger.js';
import { InquirerPrompter, type Prompter } from './project-picker.js';
import { ProjectSelector, type SelectionOutcome } from './selection/index.js';
import {
  DryRunLauncher,
  SpawnTerminalLauncher,
  getDefaultShell,
  type TerminalLauncher,
} from './terminal.js';

export interface LaunchOptions {
  mode: DiscoveryMode;
  configDir?: string;
  cliOptions?: CLIOptions;
  /** Print the plan instead of spawning a terminal */
  dryRun?: boolean;
}

/**
 * Collaborators of a run. Defaults are the interactive ones.
 */
export interface LaunchDependencies {
  prompter?: Prompter;
  createLauncher?: (config: ResolvedConfig) => TerminalLauncher;
  detect?: typeof detectDependencyManager;
  interrupts?: InterruptHandler;
  shell?: string;
}

export interface LaunchResult {
  exitCode: ExitCode;
  projectPath?: string;
  plan?: CommandPlan;
  message?: string;
}

function cancelled(message: string): LaunchResult {
  console.log(chalk.yellow(`\n${message}\n`));
  return { exitCode: EXIT_CODES.CANCELLED, message };
}

export async function runLauncher(
  options: LaunchOptions,
  deps: LaunchDependencies = {}
): Promise<LaunchResult> {
  let config: ResolvedConfig;
  try {
    config = loadConfig(options.mode, options.cliOptions, options.configDir ?? getConfigDir());
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.getFullMessage());
      return { exitCode: EXIT_CODES.CONFIG_ERROR, message: error.message };
    }
    throw error;
  }

  const prompter = deps.prompter ?? new InquirerPrompter();
  const selector = new ProjectSelector(config, options.mode, prompter, {
    signal: deps.interrupts?.signal,
  });

  deps.interrupts?.start();
  let selection: SelectionOutcome;
  try {
    selection = await selector.select();
  } finally {
    deps.interrupts?.stop();
  }

  if (selection.status === 'cancelled') {
    return cancelled(selection.message);
  }
  const { projectPath } = selection;

  const detect = deps.detect ?? detectDependencyManager;
  const manager = await detect(projectPath, config.dependencyManagers);

  const outcome = await planCommands(
    {
      baseCommands: config.customCommands,
      manager,
      decision: config.envActivation,
      editorCommand: editorCommand(config.editor),
    },
    prompter
  );
  if (outcome.status === 'cancelled') {
    return cancelled('Cancelled by user');
  }
  logger.commandPlan(projectPath, outcome.plan, outcome.activated);

  const launcher = options.dryRun
    ? new DryRunLauncher()
    : (deps.createLauncher ?? ((resolved) => new SpawnTerminalLauncher(resolved.terminal)))(config);

  try {
    await launcher.launch({
      workingDirectory: projectPath,
      shell: deps.shell ?? getDefaultShell(),
      commands: outcome.plan,
    });
  } catch (error) {
    if (error instanceof TerminalLaunchError) {
      logger.error(error.message, error);
      return { exitCode: EXIT_CODES.LAUNCH_FAILED, projectPath, plan: outcome.plan, message: error.message };
    }
    throw error;
  }

  return { exitCode: EXIT_CODES.SUCCESS, projectPath, plan: outcome.plan };
}
