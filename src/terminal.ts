// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal hand-off.
 *
 * Turns a Command Plan into a shell script that changes into the project,
 * echoes and runs every command, then replaces itself with an interactive
 * shell. The script runs in a new terminal-emulator window or, inline, in
 * the current terminal.
 */

import { spawn } from 'child_process';
import { basename } from 'path';
import chalk from 'chalk';
import { DEFAULT_SHELL, INLINE_TERMINAL } from './constants.js';
import { TerminalLaunchError } from './errors.js';
import type { CommandPlan } from './environment/composer.js';

export interface TerminalRequest {
  workingDirectory: string;
  shell: string;
  commands: CommandPlan;
}

/**
 * Terminal-spawn collaborator. Failures are reported, never retried.
 */
export interface TerminalLauncher {
  launch(request: TerminalRequest): Promise<void>;
}

/**
 * Name of the user's login shell, from $SHELL.
 */
export function getDefaultShell(env: NodeJS.ProcessEnv = process.env): string {
  const shellPath = env.SHELL;
  if (!shellPath) return DEFAULT_SHELL;
  return basename(shellPath) || DEFAULT_SHELL;
}

/**
 * Quote a value for POSIX shells.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Line that announces a command before it runs.
 */
export function formatCommandEcho(command: string): string {
  return `${chalk.cyan('Executing command:')} ${chalk.green(command)}`;
}

export function buildShellScript(request: TerminalRequest): string {
  const lines = [`cd ${shellQuote(request.workingDirectory)}`];
  for (const command of request.commands) {
    lines.push(`printf '%s\\n' ${shellQuote(formatCommandEcho(command))}`);
    lines.push(command);
  }
  lines.push(`exec ${request.shell}`);
  return lines.join('\n');
}

/**
 * Arguments that make a terminal emulator run `shell -c script` in cwd.
 */
export function terminalArgs(terminal: string, shell: string, script: string, cwd: string): string[] {
  switch (basename(terminal)) {
    case 'gnome-terminal':
      return ['--working-directory', cwd, '--', shell, '-c', script];
    case 'konsole':
      return ['--workdir', cwd, '-e', shell, '-c', script];
    case 'kitty':
      return ['--directory', cwd, shell, '-c', script];
    default:
      return ['-e', shell, '-c', script];
  }
}

/**
 * Launcher that spawns a detached terminal emulator, or an inline shell
 * when the terminal is "inline".
 */
export class SpawnTerminalLauncher implements TerminalLauncher {
  constructor(private readonly terminal: string) {}

  launch(request: TerminalRequest): Promise<void> {
    const script = buildShellScript(request);
    if (this.terminal === INLINE_TERMINAL) {
      return this.runInline(request, script);
    }

    const args = terminalArgs(this.terminal, request.shell, script, request.workingDirectory);
    return new Promise((resolve, reject) => {
      const child = spawn(this.terminal, args, {
        cwd: request.workingDirectory,
        detached: true,
        stdio: 'ignore',
      });
      child.once('error', (error) => {
        reject(new TerminalLaunchError(`Failed to launch ${this.terminal}: ${error.message}`, this.terminal, error));
      });
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }

  private runInline(request: TerminalRequest, script: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(request.shell, ['-c', script], {
        cwd: request.workingDirectory,
        stdio: 'inherit',
      });
      child.once('error', (error) => {
        reject(new TerminalLaunchError(`Failed to start ${request.shell}: ${error.message}`, INLINE_TERMINAL, error));
      });
      child.once('exit', () => resolve());
    });
  }
}

/**
 * Launcher that prints what would run instead of running it.
 */
export class DryRunLauncher implements TerminalLauncher {
  constructor(private readonly write: (line: string) => void = console.log) {}

  async launch(request: TerminalRequest): Promise<void> {
    this.write(chalk.bold(request.workingDirectory));
    request.commands.forEach((command, index) => {
      this.write(`  ${index + 1}. ${command}`);
    });
    this.write(chalk.dim(`  then: ${request.shell}`));
  }
}
