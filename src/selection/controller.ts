// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Selection Controller
 *
 * Drives one project selection through
 *   start → discovering → awaiting-choice → resolved | cancelled
 *
 * Cancellation at any point is terminal: the caller gets a cancelled
 * outcome and must not detect managers, compose commands or spawn anything.
 */

import { join } from 'path';
import type { DiscoveryMode, ResolvedConfig } from '../config/types.js';
import { ConfigError, DiscoveryAbortedError } from '../errors.js';
import { logger } from '../logger.js';
import { spinner } from '../spinner.js';
import type { ProjectCandidate, PromptAnswer, Prompter } from '../project-picker.js';
import {
  buildProjectIndex,
  createPathFilter,
  indexDirectories,
  listSubprojects,
  resolveProject,
  type DiscoveredDirectory,
  type IndexWarning,
  type PathFilter,
} from '../discovery/index.js';

export type SelectionState = 'start' | 'discovering' | 'awaiting-choice' | 'resolved' | 'cancelled';

export type CancelReason = 'user' | 'no-projects' | 'not-found' | 'interrupted';

export type SelectionOutcome =
  | { status: 'resolved'; projectPath: string }
  | { status: 'cancelled'; reason: CancelReason; message: string };

type Cancelled = Extract<SelectionOutcome, { status: 'cancelled' }>;

export interface SelectorOptions {
  /** Aborts the fuzzy-mode directory walk */
  signal?: AbortSignal;
}

export class ProjectSelector {
  private currentState: SelectionState = 'start';
  private warnings: IndexWarning[] = [];

  constructor(
    private readonly config: ResolvedConfig,
    private readonly mode: DiscoveryMode,
    private readonly prompter: Prompter,
    private readonly options: SelectorOptions = {}
  ) {}

  get state(): SelectionState {
    return this.currentState;
  }

  /**
   * Subtrees skipped during the last fuzzy-mode walk.
   */
  get discoveryWarnings(): readonly IndexWarning[] {
    return this.warnings;
  }

  /**
   * Run the selection. May only be called once per selector.
   */
  async select(): Promise<SelectionOutcome> {
    if (this.currentState !== 'start') {
      throw new Error(`Selection already ran (state: ${this.currentState})`);
    }

    this.currentState = 'discovering';
    const filter = createPathFilter(this.config);
    return this.mode.kind === 'direct'
      ? this.selectDirect(filter)
      : this.selectFuzzy(filter);
  }

  private async selectDirect(filter: PathFilter): Promise<SelectionOutcome> {
    const projectPath = this.config.projectPath;
    if (projectPath === null) {
      throw new ConfigError('projectPath is required for direct listing');
    }

    if (!this.config.multipleSubprojects) {
      return this.resolve(projectPath);
    }

    const names = await listSubprojects(projectPath, filter);
    const candidates = names.map((name) => ({ name, description: projectPath }));

    const choice = await this.choose(candidates, false);
    if (typeof choice !== 'string') {
      return choice;
    }
    if (!names.includes(choice)) {
      return this.cancel('not-found', `Project "${choice}" not found`);
    }
    return this.resolve(join(projectPath, choice));
  }

  private async selectFuzzy(filter: PathFilter): Promise<SelectionOutcome> {
    let directories: DiscoveredDirectory[];
    const startedAt = Date.now();
    try {
      spinner.indexing(0);
      const result = await indexDirectories(this.config.defaultProjectsPaths, filter, {
        signal: this.options.signal,
        onProgress: (visited) => spinner.indexing(visited),
      });
      directories = result.directories;
      this.warnings = result.warnings;
    } catch (error) {
      if (error instanceof DiscoveryAbortedError) {
        spinner.fail(error.message);
        return this.cancel('interrupted', 'Indexing interrupted');
      }
      spinner.stop();
      throw error;
    }

    const index = buildProjectIndex(directories);
    spinner.indexingDone(index.entries.size);
    logger.indexSummary(directories.length, this.warnings.length, Date.now() - startedAt);

    for (const warning of this.warnings) {
      logger.verbose(`Skipped ${warning.path}: ${warning.message}`);
    }
    for (const { name, keptPath, shadowedPath } of index.shadowed) {
      logger.shadowedProject(name, keptPath, shadowedPath);
    }

    const candidates = [...index.entries].map(([name, parentPath]) => ({
      name,
      description: parentPath,
    }));

    const choice = await this.choose(candidates, true);
    if (typeof choice !== 'string') {
      return choice;
    }

    const projectPath = resolveProject(choice, index);
    if (projectPath === null) {
      return this.cancel('not-found', `Project "${choice}" not found`);
    }
    return this.resolve(projectPath);
  }

  /**
   * Hand candidates to the prompt. Returns the chosen name or a cancelled outcome.
   */
  private async choose(candidates: ProjectCandidate[], fuzzy: boolean): Promise<string | Cancelled> {
    this.currentState = 'awaiting-choice';

    if (candidates.length === 0) {
      return this.cancel('no-projects', 'No projects found');
    }

    logger.pause();
    let answer: PromptAnswer<string>;
    try {
      answer = await this.prompter.chooseProject(candidates, { fuzzy });
    } finally {
      logger.resume();
    }
    if (answer.status === 'cancelled') {
      return this.cancel('user', 'Cancelled by user');
    }
    return answer.value;
  }

  private resolve(projectPath: string): SelectionOutcome {
    this.currentState = 'resolved';
    return { status: 'resolved', projectPath };
  }

  private cancel(reason: CancelReason, message: string): Cancelled {
    this.currentState = 'cancelled';
    return { status: 'cancelled', reason, message };
  }
}
