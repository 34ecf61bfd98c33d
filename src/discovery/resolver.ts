// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Project Name Resolver
 *
 * Maps a project's leaf name to its parent path. When two discovered
 * directories share a name, the first one in traversal order is kept and
 * the later one is reported as shadowed.
 */

import { join } from 'path';
import type { DiscoveredDirectory, ProjectIndex } from './types.js';

export function buildProjectIndex(discovered: readonly DiscoveredDirectory[]): ProjectIndex {
  const entries = new Map<string, string>();
  const shadowed: ProjectIndex['shadowed'] = [];

  for (const directory of discovered) {
    // Filesystem roots have no leaf name to search by
    if (directory.leafName === '') continue;

    const keptParent = entries.get(directory.leafName);
    if (keptParent === undefined) {
      entries.set(directory.leafName, directory.parentPath);
    } else {
      shadowed.push({
        name: directory.leafName,
        keptPath: join(keptParent, directory.leafName),
        shadowedPath: directory.fullPath,
      });
    }
  }

  return { entries, shadowed };
}

/**
 * Full path of the named project, or null when the name is not indexed.
 */
export function resolveProject(name: string, index: ProjectIndex): string | null {
  const parentPath = index.entries.get(name);
  return parentPath === undefined ? null : join(parentPath, name);
}
