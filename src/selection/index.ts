// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export {
  ProjectSelector,
  type CancelReason,
  type SelectionOutcome,
  type SelectionState,
  type SelectorOptions,
} from './controller.js';
