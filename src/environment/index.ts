// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export { detectDependencyManager, matchSignature } from './detector.js';
export {
  applyManager,
  composeCommandPlan,
  editorCommand,
  planCommands,
  type CommandPlan,
  type ComposeInput,
  type PlanOutcome,
} from './composer.js';
