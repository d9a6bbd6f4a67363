/**
 * Release version arithmetic.
 *
 * Pure derivations from a release version and a project id:
 *   foo + 2.3   → tag foo-2.3,   branch foo-2.3.x, version 2.3.1-SNAPSHOT
 *   foo + 2.3.5 → tag foo-2.3.5, branch foo-2.3.x, version 2.3.6-SNAPSHOT
 */

import { InvalidVersionError } from '../lib/error.js';
import type { MaintenanceNames, ReleaseComponents, ReleaseVersion } from './types.js';

const INTEGER_REGEX = /^[+-]?\d+$/;

function createReleaseVersion(
  major: string,
  minor: string,
  incremental: string | null,
): ReleaseVersion {
  return Object.freeze({ major, minor, incremental });
}

/**
 * Parse `major.minor[.incremental]`.
 *
 * Parts past the third are ignored: `1.2.3.4` is `1.2.3`.
 */
export function parseReleaseVersion(text: string): ReleaseVersion {
  const parts = text.trim().split('.');
  while (parts.length > 0 && parts[parts.length - 1] === '') {
    parts.pop();
  }

  if (parts.length < 2) {
    throw new InvalidVersionError(`Invalid version: ${text}`, { input: text });
  }

  const [major, minor, incremental] = parts;
  if (!major || !minor) {
    throw new InvalidVersionError(`Invalid version: ${text}`, { input: text });
  }

  return createReleaseVersion(major, minor, incremental ?? null);
}

/**
 * Build a release version from discovered components.
 * Returns null when there is no major version, i.e. nothing was released.
 */
export function releaseVersionFromComponents(
  components: ReleaseComponents,
): ReleaseVersion | null {
  const { major, minor, incremental } = components;
  if (major === undefined || major === null || major === '') {
    return null;
  }
  if (!minor) {
    throw new InvalidVersionError(`Release ${major} has no minor version`, {
      components,
    });
  }
  return createReleaseVersion(major, minor, incremental ? incremental : null);
}

export function releaseVersion(v: ReleaseVersion): string {
  const base = `${v.major}.${v.minor}`;
  return v.incremental !== null ? `${base}.${v.incremental}` : base;
}

export function tagName(projectId: string, v: ReleaseVersion): string {
  return `${projectId}-${releaseVersion(v)}`;
}

export function branchName(projectId: string, v: ReleaseVersion): string {
  return `${projectId}-${v.major}.${v.minor}.x`;
}

/**
 * Next development version on the maintenance branch.
 * 2.3 → 2.3.1-SNAPSHOT, 2.3.5 → 2.3.6-SNAPSHOT
 */
export function branchVersion(v: ReleaseVersion): string {
  const next = v.incremental === null ? 1 : parseIncremental(v.incremental) + 1;
  return `${v.major}.${v.minor}.${next}-SNAPSHOT`;
}

function parseIncremental(incremental: string): number {
  const value = INTEGER_REGEX.test(incremental) ? Number(incremental) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidVersionError(
      `Invalid incremental version: ${incremental}`,
      { incremental },
    );
  }
  return value;
}

/**
 * Tag name without its trailing `.incremental` segment.
 * Some releases are tagged without one: foo-2.3.0 may exist only as foo-2.3.
 */
export function fallbackTagName(tag: string): string {
  const index = tag.lastIndexOf('.');
  return index === -1 ? tag : tag.substring(0, index);
}

export function calculateNames(projectId: string, v: ReleaseVersion): MaintenanceNames {
  return {
    releaseVersion: releaseVersion(v),
    tagName: tagName(projectId, v),
    branchName: branchName(projectId, v),
    branchVersion: branchVersion(v),
  };
}
