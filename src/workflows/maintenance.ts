/**
 * Maintenance Branch Workflow - maint
 *
 * Branches `<project>-<major>.<minor>.x` off a release tag and commits the
 * next development version on it. Steps run strictly in order; the first
 * failure ends the run and nothing is rolled back.
 */

import type { LocalGit } from '../clients/git/local.js';
import type {
  MaintenanceNames,
  MaintenanceResult,
  MaintenanceStep,
  ReleaseVersion,
} from '../domain/types.js';
import type { LatestReleaseLookup, Logger, VersionSetter } from '../domain/vcs.js';
import {
  calculateNames,
  fallbackTagName,
  parseReleaseVersion,
  releaseVersionFromComponents,
} from '../domain/version.js';
import {
  BranchCreationError,
  CancelledError,
  CommitError,
  ConfigStepError,
  DirtyWorkingTreeError,
  NoReleaseFoundError,
} from '../lib/error.js';

export const COMMIT_MESSAGE = 'preparing maintenance branch for development';

export interface MaintenanceDeps {
  git: LocalGit;
  releases: LatestReleaseLookup;
  versionSetter: VersionSetter;
  logger: Logger;
}

export interface MaintenanceOptions {
  /** Tag and branch prefix */
  projectId: string;
  /** `major.minor[.incremental]`; the latest release when absent */
  baseVersion?: string | null;
  /** Keep copies of rewritten manifests (default: false) */
  keepBackups?: boolean;
  /** Aborting stops the workflow with a `cancelled` result */
  signal?: AbortSignal;
}

/**
 * Runs before each step and after each command: a command interrupted
 * alongside the workflow exits non-zero, which must not be read as a failure.
 */
function checkpoint(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

async function resolveReleaseVersion(
  releases: LatestReleaseLookup,
  options: MaintenanceOptions,
): Promise<ReleaseVersion> {
  if (options.baseVersion) {
    return parseReleaseVersion(options.baseVersion);
  }

  const components = await releases.findLatestRelease({ signal: options.signal });
  const version = components ? releaseVersionFromComponents(components) : null;
  if (!version) {
    throw new NoReleaseFoundError();
  }
  return version;
}

/**
 * Create a branch from the release tag, retrying once from the tag without
 * its incremental segment. The shorter tag is not checked before the retry.
 */
async function createBranch(
  git: LocalGit,
  names: MaintenanceNames,
  signal: AbortSignal | undefined,
): Promise<{ tagUsed: string; usedFallbackTag: boolean }> {
  const first = await git.checkoutNewBranch(names.branchName, names.tagName, { signal });
  checkpoint(signal);
  if (first.exitCode === 0) {
    return { tagUsed: names.tagName, usedFallbackTag: false };
  }

  const fallbackTag = fallbackTagName(names.tagName);
  const retry = await git.checkoutNewBranch(names.branchName, fallbackTag, { signal });
  checkpoint(signal);
  if (retry.exitCode !== 0) {
    throw new BranchCreationError(retry.exitCode, {
      branch: names.branchName,
      tags: [names.tagName, fallbackTag],
    });
  }
  return { tagUsed: fallbackTag, usedFallbackTag: true };
}

async function setBranchVersion(
  versionSetter: VersionSetter,
  version: string,
  keepBackups: boolean,
): Promise<void> {
  try {
    await versionSetter.setVersion(version, { keepBackups });
  } catch (e) {
    if (e instanceof ConfigStepError) throw e;
    throw new ConfigStepError(
      `Could not set project version to ${version}: ${e instanceof Error ? e.message : String(e)}`,
      { version },
    );
  }
}

/**
 * Execute the maintenance branch workflow.
 */
export async function createMaintenanceBranch(
  deps: MaintenanceDeps,
  options: MaintenanceOptions,
): Promise<MaintenanceResult> {
  const { git, releases, versionSetter, logger } = deps;
  const { projectId, signal } = options;
  let step: MaintenanceStep = 'resolve-version';

  try {
    // 1. Resolve release version
    checkpoint(signal);
    const version = await resolveReleaseVersion(releases, options);

    // 2. Derive names
    const names = calculateNames(projectId, version);
    logger.info(`Release version is [${names.releaseVersion}]`);
    logger.info(`Creating branch from tag [${names.tagName}]`);
    logger.info(
      `Branch [${names.branchName}] will be created with version [${names.branchVersion}]`,
    );

    // 3. Validate clean working tree
    step = 'check-clean';
    checkpoint(signal);
    const unstaged = await git.diffWorkingTree({ signal });
    checkpoint(signal);
    if (unstaged.exitCode !== 0) {
      throw new DirtyWorkingTreeError();
    }
    const staged = await git.diffIndex({ signal });
    checkpoint(signal);
    if (staged.exitCode !== 0) {
      throw new DirtyWorkingTreeError();
    }

    // 4. Create branch from tag
    step = 'create-branch';
    checkpoint(signal);
    const { tagUsed, usedFallbackTag } = await createBranch(git, names, signal);
    logger.info(`Branch [${names.branchName}] created successfully`);

    // 5. Bump version on the new branch
    step = 'set-version';
    checkpoint(signal);
    logger.info('Updating project version');
    await setBranchVersion(versionSetter, names.branchVersion, options.keepBackups ?? false);

    // 6. Commit
    step = 'commit';
    checkpoint(signal);
    const commit = await git.commitAll(COMMIT_MESSAGE, { signal });
    checkpoint(signal);
    if (commit.exitCode !== 0) {
      throw new CommitError(commit.exitCode);
    }

    return { status: 'created', names, tagUsed, usedFallbackTag };
  } catch (e) {
    if (e instanceof CancelledError) {
      return { status: 'cancelled', step };
    }
    throw e;
  }
}
