// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Direct listing: the immediate subdirectories of one curated path.
 * No recursion; only the exclusion filter is applied.
 */

import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { logger } from '../logger.js';
import { compareNames } from './indexer.js';
import { filterDirectoryNames, type PathFilter } from './path-filter.js';

/**
 * List subproject names under projectPath, sorted.
 * An unreadable projectPath yields an empty list and a warning.
 */
export async function listSubprojects(projectPath: string, filter: PathFilter): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(projectPath);
  } catch (error) {
    logger.warn(`Cannot list ${projectPath}: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }

  const subprojects: string[] = [];
  for (const name of filterDirectoryNames(names, filter)) {
    try {
      // stat follows symlinks, so linked project directories are listed too
      const stats = await stat(join(projectPath, name));
      if (stats.isDirectory()) {
        subprojects.push(name);
      }
    } catch {
      logger.debug(`Skipping unreadable entry ${join(projectPath, name)}`);
    }
  }

  return subprojects.sort(compareNames);
}
