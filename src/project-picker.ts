// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Interactive Project Picker
 *
 * Prompts used by the selector and the command planner: a list for
 * direct mode, a type-to-search list for fuzzy mode, and a yes/no question.
 * Ctrl+C in any prompt comes back as a cancelled answer.
 */

import { confirm, search, select } from '@inquirer/prompts';
import { SEARCH_PAGE_LIMIT } from './constants.js';
import { fuzzyFilter } from './fuzzy.js';

/**
 * A selectable project: its leaf name, plus metadata shown alongside it.
 */
export interface ProjectCandidate {
  name: string;
  description: string;
}

export type PromptAnswer<T> =
  | { status: 'answered'; value: T }
  | { status: 'cancelled' };

/**
 * Prompt collaborator used by the core. Never rendered by the core itself.
 */
export interface Prompter {
  chooseProject(
    candidates: readonly ProjectCandidate[],
    options: { fuzzy: boolean }
  ): Promise<PromptAnswer<string>>;
  confirm(message: string): Promise<PromptAnswer<boolean>>;
}

/**
 * Whether an error is the prompt library's cancellation signal (Ctrl+C or abort).
 */
export function isPromptCancellation(error: unknown): boolean {
  return error instanceof Error && (error.name === 'ExitPromptError' || error.name === 'AbortPromptError');
}

/**
 * Candidates matching the search input, shaped as prompt choices.
 */
export function searchChoices(
  candidates: readonly ProjectCandidate[],
  input: string | undefined
): Array<{ name: string; value: string; description: string }> {
  return fuzzyFilter(candidates, input ?? '', (candidate) => candidate.name)
    .slice(0, SEARCH_PAGE_LIMIT)
    .map((candidate) => ({
      name: candidate.name,
      value: candidate.name,
      description: candidate.description,
    }));
}

async function answerOrCancel<T>(ask: () => Promise<T>): Promise<PromptAnswer<T>> {
  try {
    return { status: 'answered', value: await ask() };
  } catch (error) {
    if (isPromptCancellation(error)) {
      return { status: 'cancelled' };
    }
    throw error;
  }
}

/**
 * Prompter backed by @inquirer/prompts.
 */
export class InquirerPrompter implements Prompter {
  chooseProject(
    candidates: readonly ProjectCandidate[],
    options: { fuzzy: boolean }
  ): Promise<PromptAnswer<string>> {
    if (options.fuzzy) {
      return answerOrCancel(() =>
        search({
          message: 'Select project by name',
          source: async (input) => searchChoices(candidates, input),
          pageSize: 15,
        })
      );
    }

    return answerOrCancel(() =>
      select({
        message: 'What project do you want to open?',
        choices: candidates.map((candidate) => ({
          name: candidate.name,
          value: candidate.name,
          description: candidate.description,
        })),
        pageSize: 15,
      })
    );
  }

  confirm(message: string): Promise<PromptAnswer<boolean>> {
    return answerOrCancel(() => confirm({ message, default: true }));
  }
}
