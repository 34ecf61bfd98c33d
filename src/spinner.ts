// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Centralized spinner management using ora for visual feedback while
 * the project index is being built.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Manages a single spinner instance with TTY detection.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean = true;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.enabled) return;

    if (this.spinner) {
      this.spinner.stop();
    }

    this.spinner = ora({
      text,
      color: 'cyan',
      spinner: 'dots',
      // Ctrl+C must reach the SIGINT handler that aborts the walk
      discardStdin: false,
    }).start();
  }

  /**
   * Update the spinner text.
   */
  update(text: string): void {
    if (this.spinner && this.enabled) {
      this.spinner.text = text;
    }
  }

  /**
   * Stop the spinner with a success message.
   */
  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  // ============================================
  // Convenience methods for common operations
  // ============================================

  /**
   * Show or advance the indexing spinner.
   */
  indexing(visited: number): void {
    const text = chalk.blue(`Indexing projects... ${visited.toLocaleString()} directories`);
    if (this.spinner) {
      this.update(text);
    } else {
      this.start(text);
    }
  }

  /**
   * Complete indexing with summary.
   */
  indexingDone(projects: number): void {
    this.succeed(chalk.green(`Indexed ${projects.toLocaleString()} projects`));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
