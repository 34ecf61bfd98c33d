// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for debug output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - discovery summary and shadowed projects */
  VERBOSE = 1,
  /** Debug - detection and command plan details */
  DEBUG = 2,
  /** Trace - every directory visited */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;
  private paused: boolean = false;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Pause leveled logging (useful during user input prompts).
   */
  pause(): void {
    this.paused = true;
  }

  /**
   * Resume logging.
   */
  resume(): void {
    this.paused = false;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return !this.paused && this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log the result of a discovery walk at VERBOSE level.
   */
  indexSummary(directoryCount: number, warningCount: number, durationMs: number): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      const warnings = warningCount > 0 ? `, ${warningCount} skipped` : '';
      console.log(chalk.dim(
        `[Index] ${directoryCount.toLocaleString()} directories${warnings} in ${(durationMs / 1000).toFixed(2)}s`
      ));
    }
  }

  /**
   * Log a project hidden by an earlier one with the same name, at VERBOSE level.
   */
  shadowedProject(name: string, keptPath: string, shadowedPath: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.log(chalk.yellow(`[Index] "${name}" at ${shadowedPath} is shadowed by ${keptPath}`));
    }
  }

  /**
   * Log the composed command plan at DEBUG level.
   */
  commandPlan(projectPath: string, commands: readonly string[], activated: boolean): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      const environment = activated ? ' (environment activated)' : '';
      console.log(chalk.dim(`[Plan] ${projectPath}${environment}`));
      commands.forEach((command, index) => {
        console.log(chalk.dim(`   ${index + 1}. ${command}`));
      });
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
