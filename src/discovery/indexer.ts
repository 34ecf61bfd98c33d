// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Directory Indexer
 *
 * Walks the configured roots depth-first and records every directory it
 * visits, not just leaves, since a project may sit at any depth. Excluded
 * names are pruned before descent. Symlinked directories are followed, and
 * a visited set keyed by real path guarantees each real directory is
 * entered at most once, so symlink cycles terminate.
 */

import type { Dirent } from 'fs';
import { readdir, realpath, stat } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { DiscoveryAbortedError } from '../errors.js';
import { logger } from '../logger.js';
import { shouldExclude, type PathFilter } from './path-filter.js';
import type { DiscoveredDirectory, IndexOptions, IndexResult, IndexWarning } from './types.js';

/**
 * Locale-independent name ordering, so traversal order is stable across machines.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}

export function toDiscoveredDirectory(fullPath: string): DiscoveredDirectory {
  return {
    fullPath,
    parentPath: dirname(fullPath),
    leafName: basename(fullPath),
  };
}

/**
 * Names of the child directories of dirPath that pass the filter, sorted.
 * Symlinks count when they resolve to a directory; broken ones are reported.
 */
async function listChildDirectories(
  dirPath: string,
  entries: Dirent[],
  filter: PathFilter,
  warnings: IndexWarning[]
): Promise<string[]> {
  const names: string[] = [];

  for (const entry of entries) {
    if (shouldExclude(entry.name, filter)) {
      continue;
    }

    if (entry.isDirectory()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink()) {
      const linkPath = join(dirPath, entry.name);
      try {
        const target = await stat(linkPath);
        if (target.isDirectory()) {
          names.push(entry.name);
        }
      } catch (error) {
        warnings.push({ path: linkPath, message: `broken symlink (${errorMessage(error)})` });
      }
    }
  }

  return names.sort(compareNames);
}

/**
 * Index every directory under the given roots.
 *
 * Unreadable directories are skipped with a warning. Throws
 * DiscoveryAbortedError if the signal fires before the walk completes.
 */
export async function indexDirectories(
  roots: readonly string[],
  filter: PathFilter,
  options: IndexOptions = {}
): Promise<IndexResult> {
  const { signal, onProgress } = options;
  const directories: DiscoveredDirectory[] = [];
  const warnings: IndexWarning[] = [];
  const visited = new Set<string>();

  for (const root of roots) {
    // Pre-order DFS; children are pushed in reverse so they pop in sorted order
    const stack: string[] = [resolve(root)];

    while (stack.length > 0) {
      if (signal?.aborted) {
        throw new DiscoveryAbortedError(directories.length);
      }

      const dirPath = stack.pop();
      if (dirPath === undefined) break;

      let realPath: string;
      try {
        realPath = await realpath(dirPath);
      } catch (error) {
        warnings.push({ path: dirPath, message: `cannot resolve (${errorMessage(error)})` });
        continue;
      }

      if (visited.has(realPath)) {
        logger.trace(`Skipping ${dirPath}: already visited as ${realPath}`);
        continue;
      }
      visited.add(realPath);

      let entries: Dirent[];
      try {
        entries = await readdir(dirPath, { withFileTypes: true });
      } catch (error) {
        warnings.push({ path: dirPath, message: `cannot read (${errorMessage(error)})` });
        continue;
      }

      directories.push(toDiscoveredDirectory(dirPath));
      logger.trace(dirPath);
      onProgress?.(directories.length);

      const children = await listChildDirectories(dirPath, entries, filter, warnings);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(join(dirPath, children[i]));
      }
    }
  }

  return { directories, warnings };
}
