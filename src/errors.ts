// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error types raised by the loader.
 *
 * Resolution misses and user cancellation are not errors: they come back
 * as cancelled outcomes from the selector and the command planner.
 */

/**
 * Malformed, missing or contradictory configuration.
 * Always raised before discovery begins.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public problems: string[] = [],
    public configPath?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  /**
   * Format the error with every problem on its own line.
   */
  getFullMessage(): string {
    let output = this.message;
    if (this.configPath) {
      output += ` (${this.configPath})`;
    }
    for (const problem of this.problems) {
      output += `\n  - ${problem}`;
    }
    return output;
  }
}

/**
 * The directory walk was interrupted through its abort signal.
 */
export class DiscoveryAbortedError extends Error {
  constructor(public visited: number) {
    super(`Discovery interrupted after ${visited} directories`);
    this.name = 'DiscoveryAbortedError';
  }
}

/**
 * The terminal emulator or inline shell could not be started.
 */
export class TerminalLaunchError extends Error {
  constructor(
    message: string,
    public terminal: string,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'TerminalLaunchError';
  }
}
