// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Utilities
 */

import * as os from 'os';
import * as path from 'path';
import type { FileConfig } from './types.js';

/**
 * Expand a leading "~" to the user's home directory.
 */
export function expandHome(filePath: string, home: string = os.homedir()): string {
  if (filePath === '~') return home;
  if (filePath.startsWith('~/')) return path.join(home, filePath.slice(2));
  return filePath;
}

/**
 * Profile file name for a profile given with or without its .json suffix.
 */
export function profileFileName(profile: string): string {
  return profile.endsWith('.json') ? profile : `${profile}.json`;
}

/**
 * Create an example global configuration file content.
 */
export function getExampleConfig(): string {
  const example: FileConfig = {
    defaultProjectsPaths: ['~/projects'],
    excludeDirs: ['node_modules', 'venv', 'dist', 'build', 'target', '__pycache__'],
    excludePrefixes: ['.'],
    dependencyManagers: [
      { name: 'poetry', marker: 'poetry.lock', activation: 'poetry shell', invocationPrefix: 'poetry run' },
      { name: 'pipenv', marker: 'Pipfile', activation: 'pipenv shell', invocationPrefix: 'pipenv run' },
      { name: 'virtualenv', marker: 'venv', activation: 'source venv/bin/activate' },
      { name: 'docker compose', marker: 'docker-compose.yml', invocationPrefix: 'docker compose run --rm app' },
    ],
    customCommands: ['git status'],
    editor: 'code',
    envActivation: 'ask',
    terminal: 'gnome-terminal',
  };

  return JSON.stringify(example, null, 2) + '\n';
}
