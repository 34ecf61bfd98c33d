// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { ResolvedConfig } from '../config/types.js';

/**
 * Exclusion rules for directory names. Matching is case-sensitive.
 */
export interface PathFilter {
  readonly excludeDirs: ReadonlySet<string>;
  readonly excludePrefixes: readonly string[];
}

export function createPathFilter(
  config: Pick<ResolvedConfig, 'excludeDirs' | 'excludePrefixes'>
): PathFilter {
  return {
    excludeDirs: new Set(config.excludeDirs),
    excludePrefixes: [...config.excludePrefixes],
  };
}

/**
 * True if a directory with this name must be neither listed nor descended into.
 */
export function shouldExclude(name: string, filter: PathFilter): boolean {
  if (filter.excludeDirs.has(name)) {
    return true;
  }
  return filter.excludePrefixes.some((prefix) => name.startsWith(prefix));
}

/**
 * Keep only the names the filter allows, in their original order.
 */
export function filterDirectoryNames(names: readonly string[], filter: PathFilter): string[] {
  return names.filter((name) => !shouldExclude(name, filter));
}
