// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export type {
  DiscoveredDirectory,
  IndexOptions,
  IndexResult,
  IndexWarning,
  ProjectIndex,
  ShadowedProject,
} from './types.js';
export { createPathFilter, shouldExclude, filterDirectoryNames, type PathFilter } from './path-filter.js';
export { indexDirectories, compareNames, toDiscoveredDirectory } from './indexer.js';
export { listSubprojects } from './direct-listing.js';
export { buildProjectIndex, resolveProject } from './resolver.js';
