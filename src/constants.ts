// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for the project loader.
 */

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
  /** Project resolved and handed off to the terminal */
  SUCCESS: 0,
  /** Terminal emulator could not be spawned */
  LAUNCH_FAILED: 1,
  /** Configuration or startup error (EX_CONFIG) */
  CONFIG_ERROR: 78,
  /** User cancelled, or there was nothing to open */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Environment variable that overrides the config directory.
 */
export const CONFIG_DIR_ENV = 'PROJLOAD_CONFIG_DIR';

/** Terminal emulator used when none is configured */
export const DEFAULT_TERMINAL = 'gnome-terminal';

/** Shell used when $SHELL is unset */
export const DEFAULT_SHELL = 'bash';

/**
 * Pseudo-terminal name that runs the plan in the current terminal.
 */
export const INLINE_TERMINAL = 'inline';

/** Maximum matches shown by the fuzzy project search */
export const SEARCH_PAGE_LIMIT = 50;
