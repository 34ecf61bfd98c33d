#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { Option, program } from 'commander';
import chalk from 'chalk';
import { runLauncher } from './app.js';
import { getConfigDir, initConfig, type DiscoveryMode } from './config/index.js';
import { EXIT_CODES } from './constants.js';
import { InterruptHandler } from './interrupt.js';
import { logger, parseLogLevel } from './logger.js';
import { VERSION } from './version.js';

interface CliOptions {
  profile?: string;
  find?: boolean;
  configDir?: string;
  terminal?: string;
  inline?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

// CLI setup
program
  .name('projload')
  .description('Find a project and open a terminal in it, environment ready')
  .version(VERSION, '-v, --version', 'Output the current version')
  .addOption(new Option('-p, --profile <name>', 'List subprojects of the path set in a profile').conflicts('find'))
  .addOption(new Option('-f, --find', 'Search projects by name across the default project paths').conflicts('profile'))
  .option('--config-dir <dir>', 'Config directory (default: $PROJLOAD_CONFIG_DIR or ~/.projload)')
  .option('-t, --terminal <cmd>', 'Terminal emulator to open')
  .option('--inline', 'Run in the current terminal instead of opening a new one')
  .option('--dry-run', 'Print the project and commands without running them')
  .option('--verbose', 'Show discovery summary and shadowed projects')
  .option('--debug', 'Show detection and command plan details')
  .option('--trace', 'Show every directory visited')
  .enablePositionalOptions()
  .action(async (options: CliOptions) => {
    logger.setLevel(parseLogLevel(options));

    let mode: DiscoveryMode;
    if (options.profile) {
      mode = { kind: 'direct', profile: options.profile };
    } else if (options.find) {
      mode = { kind: 'fuzzy' };
    } else {
      program.error('error: one of --profile <name> or --find is required', {
        exitCode: EXIT_CODES.CONFIG_ERROR,
      });
    }

    const result = await runLauncher(
      {
        mode,
        configDir: options.configDir,
        cliOptions: { terminal: options.terminal, inline: options.inline },
        dryRun: options.dryRun,
      },
      { interrupts: new InterruptHandler() }
    );
    process.exitCode = result.exitCode;
  });

program
  .command('init')
  .description('Write an example config file')
  .option('--config-dir <dir>', 'Config directory (default: $PROJLOAD_CONFIG_DIR or ~/.projload)')
  .action((options: { configDir?: string }) => {
    const result = initConfig(getConfigDir(options.configDir));
    if (result.success) {
      console.log(chalk.green(`Created ${result.path}`));
    } else {
      logger.error(`${result.error ?? 'Could not write config'}: ${result.path}`);
      process.exitCode = EXIT_CODES.CONFIG_ERROR;
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error), error instanceof Error ? error : undefined);
  process.exitCode = EXIT_CODES.LAUNCH_FAILED;
});
