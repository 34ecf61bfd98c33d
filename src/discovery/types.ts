// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Discovery Types
 */

/**
 * A directory found during indexing. Exists only for one discovery session.
 */
export interface DiscoveredDirectory {
  fullPath: string;
  parentPath: string;
  leafName: string;
}

/**
 * A subtree skipped because it could not be read.
 */
export interface IndexWarning {
  path: string;
  message: string;
}

export interface IndexResult {
  /** Every visited directory, in traversal order */
  directories: DiscoveredDirectory[];
  warnings: IndexWarning[];
}

export interface IndexOptions {
  /** Checked before each directory is read */
  signal?: AbortSignal;
  /** Called with the running count of visited directories */
  onProgress?: (visited: number) => void;
}

/**
 * A directory hidden from the index by an earlier one with the same leaf name.
 */
export interface ShadowedProject {
  name: string;
  keptPath: string;
  shadowedPath: string;
}

/**
 * Leaf name to parent path, first-encountered wins.
 */
export interface ProjectIndex {
  entries: Map<string, string>;
  shadowed: ShadowedProject[];
}
