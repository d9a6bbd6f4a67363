/**
 * Core domain types for maint.
 */

/** A previously published version. `incremental` is the optional patch level. */
export interface ReleaseVersion {
  readonly major: string;
  readonly minor: string;
  readonly incremental: string | null;
}

/** Version components as reported by release discovery. Any may be missing. */
export interface ReleaseComponents {
  major?: string | null;
  minor?: string | null;
  incremental?: string | null;
}

/** Names derived from a release version and project id */
export interface MaintenanceNames {
  releaseVersion: string;
  tagName: string;
  branchName: string;
  branchVersion: string;
}

/** Exit status and combined stdout/stderr of one command */
export interface CommandResult {
  exitCode: number;
  output: string;
}

/** Workflow steps, in execution order */
export type MaintenanceStep =
  | 'resolve-version'
  | 'check-clean'
  | 'create-branch'
  | 'set-version'
  | 'commit';

export type MaintenanceResult =
  | {
    status: 'created';
    names: MaintenanceNames;
    /** Tag the branch was actually created from */
    tagUsed: string;
    usedFallbackTag: boolean;
  }
  | {
    status: 'cancelled';
    step: MaintenanceStep;
  };
