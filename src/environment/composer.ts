// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command Composer
 *
 * Builds the Command Plan: the ordered shell commands run in the project
 * before the interactive shell takes over. Plans are fresh frozen values;
 * nothing is carried between calls.
 */

import type { DependencyManagerSignature, EnvActivationPolicy } from '../config/types.js';
import type { Prompter } from '../project-picker.js';

export type CommandPlan = readonly string[];

export interface ComposeInput {
  baseCommands: readonly string[];
  manager: DependencyManagerSignature | null;
  decision: EnvActivationPolicy;
  /** Full editor command, always last and never prefixed */
  editorCommand: string;
}

export type PlanOutcome =
  | { status: 'planned'; plan: CommandPlan; activated: boolean }
  | { status: 'cancelled' };

/**
 * The editor invocation that opens the project root.
 */
export function editorCommand(editor: string): string {
  return `${editor} .`;
}

/**
 * Bring base commands into the manager's environment.
 *
 * A manager with an activation command is activated once and the shell
 * keeps it; otherwise each command is wrapped in the invocation prefix.
 */
export function applyManager(
  manager: DependencyManagerSignature,
  baseCommands: readonly string[]
): string[] {
  if (manager.activation) {
    return [manager.activation, ...baseCommands];
  }
  const prefix = manager.invocationPrefix ?? '';
  return baseCommands.map((command) => `${prefix} ${command}`);
}

/**
 * Compose a Command Plan. Pure.
 *
 * With decision "ask", `confirmed` carries the user's answer; anything
 * but true behaves as "skip".
 */
export function composeCommandPlan(input: ComposeInput & { confirmed?: boolean }): CommandPlan {
  const { baseCommands, manager, decision, confirmed } = input;

  const activate = decision === 'auto' || (decision === 'ask' && confirmed === true);
  const commands = manager !== null && activate ? applyManager(manager, baseCommands) : [...baseCommands];

  return Object.freeze([...commands, input.editorCommand]);
}

/**
 * Resolve the activation decision, asking the user when policy says so,
 * and compose the plan. The question is only asked when a manager was found.
 */
export async function planCommands(input: ComposeInput, prompter: Prompter): Promise<PlanOutcome> {
  const { manager, decision } = input;

  if (manager === null || decision !== 'ask') {
    const plan = composeCommandPlan(input);
    return { status: 'planned', plan, activated: manager !== null && decision === 'auto' };
  }

  const answer = await prompter.confirm(`Do you want to activate / run custom commands in ${manager.name}?`);
  if (answer.status === 'cancelled') {
    return { status: 'cancelled' };
  }

  return {
    status: 'planned',
    plan: composeCommandPlan({ ...input, confirmed: answer.value }),
    activated: answer.value,
  };
}
