import { copyFile } from 'node:fs/promises';
import type { ManifestType } from '../domain/config.js';
import type { SetVersionOptions, VersionSetter } from '../domain/vcs.js';
import { ConfigStepError } from '../lib/error.js';
import { createManifest } from './factory.js';

export const BACKUP_SUFFIX = '.versionsBackup';

/**
 * Sets the declared version in the project's manifest.
 */
export class ManifestVersionSetter implements VersionSetter {
  constructor(
    private readonly root: string = process.cwd(),
    private readonly type: ManifestType = 'auto',
  ) {}

  async setVersion(version: string, options: SetVersionOptions): Promise<void> {
    const manifest = await createManifest(this.root, this.type);
    if (!manifest) {
      throw new ConfigStepError(
        `No ${this.type === 'auto' ? 'project' : this.type} manifest found in ${this.root}`,
        { root: this.root, type: this.type },
      );
    }

    try {
      if (options.keepBackups) {
        await copyFile(manifest.fullPath, manifest.fullPath + BACKUP_SUFFIX);
      }
      await manifest.setVersion(version);
    } catch (e) {
      throw new ConfigStepError(
        `Could not set version ${version} in ${manifest.path}: ${e instanceof Error ? e.message : String(e)}`,
        { path: manifest.path, version },
      );
    }
  }
}
