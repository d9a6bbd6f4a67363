/**
 * Release discovery from tags named `<project>-<major>.<minor>[.<incremental>]`.
 *
 * Git-specific: parses `git tag --list` output.
 */

import type { ReleaseComponents } from '../../domain/types.js';
import type { LatestReleaseLookup, RunOptions } from '../../domain/vcs.js';
import type { LocalGit } from './local.js';

/** Tag name with its version components kept as written */
export interface ReleaseTag {
  tag: string;
  major: string;
  minor: string;
  incremental: string | null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse a release tag for a project. Returns null for unrelated tags.
 */
export function parseReleaseTag(projectId: string, tag: string): ReleaseTag | null {
  const pattern = new RegExp(`^${escapeRegExp(projectId)}-(\\d+)\\.(\\d+)(?:\\.(\\d+))?$`);
  const match = tag.match(pattern);
  if (!match) return null;

  const [, major, minor, incremental] = match;
  return { tag, major, minor, incremental: incremental ? incremental : null };
}

/**
 * Compare release tags. A missing incremental sorts before `.0`.
 */
export function compareReleaseTags(a: ReleaseTag, b: ReleaseTag): number {
  const major = parseInt(a.major, 10) - parseInt(b.major, 10);
  if (major !== 0) return major;
  const minor = parseInt(a.minor, 10) - parseInt(b.minor, 10);
  if (minor !== 0) return minor;
  return incrementalRank(a) - incrementalRank(b);
}

function incrementalRank(tag: ReleaseTag): number {
  return tag.incremental === null ? -1 : parseInt(tag.incremental, 10);
}

/**
 * Pick the highest release among tag names.
 */
export function latestReleaseTag(projectId: string, tags: string[]): ReleaseTag | null {
  let latest: ReleaseTag | null = null;
  for (const tag of tags) {
    const parsed = parseReleaseTag(projectId, tag);
    if (parsed && (!latest || compareReleaseTags(parsed, latest) > 0)) {
      latest = parsed;
    }
  }
  return latest;
}

export class TagReleaseLookup implements LatestReleaseLookup {
  constructor(
    private readonly git: LocalGit,
    private readonly projectId: string,
  ) {}

  async findLatestRelease(options?: RunOptions): Promise<ReleaseComponents | null> {
    const tags = await this.git.listTags(`${this.projectId}-*`, options);
    const latest = latestReleaseTag(this.projectId, tags);
    if (!latest) return null;

    const { major, minor, incremental } = latest;
    return { major, minor, incremental };
  }
}
