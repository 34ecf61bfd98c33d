// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Type definitions for the on-disk configuration files and the resolved,
 * read-only configuration handed to discovery and command planning.
 */

/**
 * How to detect a dependency manager and bring its environment up.
 *
 * Every manager is either activatable in place (`activation`) or
 * wrappable per command (`invocationPrefix`); the validator rejects
 * signatures that are neither.
 */
export interface DependencyManagerSignature {
  /** Display name, e.g. "poetry" */
  name: string;
  /** File or directory whose presence in the project root identifies the manager */
  marker: string;
  /** Command that activates the environment for the rest of the shell session */
  activation?: string;
  /** Command that wraps a single invocation, e.g. "pipenv run" */
  invocationPrefix?: string;
}

/**
 * What to do when a dependency manager is detected.
 */
export type EnvActivationPolicy = 'skip' | 'auto' | 'ask';

export const ENV_ACTIVATION_POLICIES: readonly EnvActivationPolicy[] = ['skip', 'auto', 'ask'];

/**
 * Configuration as written in config.json or a profile.
 * Every field is optional here; required fields are checked by the validator.
 */
export interface FileConfig {
  /** Root paths searched by --find */
  defaultProjectsPaths?: string[];

  /** Directory whose subdirectories are listed by --profile */
  projectPath?: string;

  /** When false, --profile opens projectPath itself without asking */
  multipleSubprojects?: boolean;

  /** Directory names never indexed nor descended into */
  excludeDirs?: string[];

  /** Directory name prefixes never indexed nor descended into (e.g. ".") */
  excludePrefixes?: string[];

  /** Dependency managers, most specific first (first match wins) */
  dependencyManagers?: DependencyManagerSignature[];

  /** Commands run in the project before the interactive shell */
  customCommands?: string[];

  /** Editor executable, opened on the project root as "<editor> ." */
  editor?: string;

  /** Activation policy for a detected dependency manager */
  envActivation?: EnvActivationPolicy;

  /** Terminal emulator command, or "inline" to use the current terminal */
  terminal?: string;

  /** @deprecated Use envActivation: "auto" */
  autoRunCommandsInEnv?: boolean;

  /** @deprecated Use envActivation: "ask" */
  askForEnvActivation?: boolean;
}

/**
 * Fully resolved configuration after merging files and CLI options.
 * Lent read-only to every component for the duration of a run.
 */
export interface ResolvedConfig {
  readonly defaultProjectsPaths: readonly string[];
  readonly projectPath: string | null;
  readonly multipleSubprojects: boolean;
  readonly excludeDirs: readonly string[];
  readonly excludePrefixes: readonly string[];
  readonly dependencyManagers: readonly DependencyManagerSignature[];
  readonly customCommands: readonly string[];
  readonly editor: string;
  readonly envActivation: EnvActivationPolicy;
  readonly terminal: string;
}

/**
 * Discovery mode chosen on the command line. The two are mutually exclusive.
 */
export type DiscoveryMode =
  | { kind: 'direct'; profile: string }
  | { kind: 'fuzzy' };
