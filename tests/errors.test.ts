// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { ConfigError, DiscoveryAbortedError, TerminalLaunchError } from '../src/errors.js';

describe('ConfigError', () => {
  it('formats the path and each problem', () => {
    const error = new ConfigError(
      'Invalid configuration',
      ['editor is required', 'envActivation must be one of: skip, auto, ask'],
      '/cfg/config.json'
    );

    expect(error.name).toBe('ConfigError');
    expect(error.getFullMessage()).toBe(
      'Invalid configuration (/cfg/config.json)\n  - editor is required\n  - envActivation must be one of: skip, auto, ask'
    );
  });

  it('is just the message without extras', () => {
    expect(new ConfigError('Profile "x" not found').getFullMessage()).toBe('Profile "x" not found');
  });
});

describe('DiscoveryAbortedError', () => {
  it('records how far the walk got', () => {
    const error = new DiscoveryAbortedError(12);
    expect(error.visited).toBe(12);
    expect(error.message).toBe('Discovery interrupted after 12 directories');
  });
});

describe('TerminalLaunchError', () => {
  it('keeps the terminal and the cause', () => {
    const cause = new Error('spawn kitty ENOENT');
    const error = new TerminalLaunchError('Failed to launch kitty: spawn kitty ENOENT', 'kitty', cause);

    expect(error.terminal).toBe('kitty');
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(Error);
  });
});
