/**
 * Collaborator contracts for the maintenance workflow.
 *
 * The workflow never spawns processes or touches files itself. It talks to:
 * 1. CommandRunner: runs one command line in the project root
 * 2. LatestReleaseLookup: finds the most recent release when none is given
 * 3. VersionSetter: rewrites the declared project version
 */

import type { CommandResult, ReleaseComponents } from './types.js';

export interface RunOptions {
  /** Aborting kills the command; the runner rejects with CancelledError. */
  signal?: AbortSignal;
}

/** Runs a command to completion. Only the exit status drives decisions. */
export interface CommandRunner {
  run(args: string[], options?: RunOptions): Promise<CommandResult>;
}

/** Most recent release of the project, or null if it was never released. */
export interface LatestReleaseLookup {
  findLatestRelease(options?: RunOptions): Promise<ReleaseComponents | null>;
}

export interface SetVersionOptions {
  /** Keep a copy of every rewritten file */
  keepBackups: boolean;
}

/** Rewrites the project's declared version in place. */
export interface VersionSetter {
  setVersion(version: string, options: SetVersionOptions): Promise<void>;
}

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
}
