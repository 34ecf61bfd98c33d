// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interrupt handling for long directory walks.
 * Turns Ctrl+C (SIGINT) into an abort of the discovery signal while
 * indexing runs, so a huge untrimmed tree can be abandoned before the
 * prompt ever appears.
 */

import { logger } from './logger.js';

export class InterruptHandler {
  private controller = new AbortController();
  private listener: (() => void) | null = null;

  /**
   * Signal passed to the directory indexer.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Start listening for SIGINT. Safe to call more than once.
   */
  start(): void {
    if (this.listener) return;
    this.listener = () => this.handleInterrupt();
    process.on('SIGINT', this.listener);
  }

  /**
   * Stop listening; SIGINT falls back to its previous behaviour.
   */
  stop(): void {
    if (this.listener) {
      process.removeListener('SIGINT', this.listener);
      this.listener = null;
    }
  }

  private handleInterrupt(): void {
    if (this.controller.signal.aborted) {
      return;
    }
    logger.debug('Interrupt received - stopping discovery');
    this.controller.abort();
  }
}
