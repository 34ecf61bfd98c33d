// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Dependency Manager Detector
 *
 * Looks only at the immediate contents of the project root. Signatures are
 * tried in configured order and the first whose marker is present wins, so
 * more specific managers must be listed ahead of general ones.
 */

import { readdir } from 'fs/promises';
import type { DependencyManagerSignature } from '../config/types.js';
import { logger } from '../logger.js';

/**
 * First signature whose marker is among the given entry names, or null.
 */
export function matchSignature(
  entryNames: Iterable<string>,
  signatures: readonly DependencyManagerSignature[]
): DependencyManagerSignature | null {
  const present = new Set(entryNames);
  return signatures.find((signature) => present.has(signature.marker)) ?? null;
}

export async function detectDependencyManager(
  projectPath: string,
  signatures: readonly DependencyManagerSignature[]
): Promise<DependencyManagerSignature | null> {
  if (signatures.length === 0) {
    return null;
  }

  let entryNames: string[];
  try {
    entryNames = await readdir(projectPath);
  } catch (error) {
    logger.warn(`Cannot inspect ${projectPath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const manager = matchSignature(entryNames, signatures);
  if (manager) {
    logger.debug(`Detected ${manager.name} (${manager.marker})`);
  } else {
    logger.debug(`No dependency manager detected in ${projectPath}`);
  }
  return manager;
}
