/**
 * Structured error with code for programmatic handling.
 *
 * Every error must answer: What happened? Why? How do I fix it?
 */
export class MaintenanceError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'MaintenanceError';
  }
}

/** Malformed version string or non-integer incremental component. */
export class InvalidVersionError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_VERSION', details);
    this.name = 'InvalidVersionError';
  }
}

export class NoReleaseFoundError extends MaintenanceError {
  constructor(
    message = 'No release found for this project, cannot create maintenance branch',
    details?: Record<string, unknown>,
  ) {
    super(message, 'NO_RELEASE_FOUND', details);
    this.name = 'NoReleaseFoundError';
  }
}

export class DirtyWorkingTreeError extends MaintenanceError {
  constructor(
    message =
      'There are local modifications, please commit them before creating the maintenance branch',
    details?: Record<string, unknown>,
  ) {
    super(message, 'DIRTY_WORKING_TREE', details);
    this.name = 'DirtyWorkingTreeError';
  }
}

/** Branch creation failed from both the release tag and its fallback. */
export class BranchCreationError extends MaintenanceError {
  constructor(
    public exitCode: number,
    details?: Record<string, unknown>,
  ) {
    super(
      `Could not create branch from tag, status code: ${exitCode}`,
      'BRANCH_CREATION_FAILED',
      { exitCode, ...details },
    );
    this.name = 'BranchCreationError';
  }
}

/** The declared project version could not be rewritten. */
export class ConfigStepError extends MaintenanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_STEP_FAILED', details);
    this.name = 'ConfigStepError';
  }
}

export class CommitError extends MaintenanceError {
  constructor(
    public exitCode: number,
    details?: Record<string, unknown>,
  ) {
    super(
      `Could not commit version change, status code: ${exitCode}`,
      'COMMIT_FAILED',
      { exitCode, ...details },
    );
    this.name = 'CommitError';
  }
}

/**
 * Raised by a command runner when its abort signal fires.
 * The maintenance workflow turns it into a `cancelled` result.
 */
export class CancelledError extends MaintenanceError {
  constructor(message = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}
