/**
 * Manifest interface for reading/writing versions in project files.
 *
 * Implementations handle specific file formats:
 * - package.json
 * - deno.json / deno.jsonc
 * - pom.xml
 */
export interface Manifest {
  /** Unique identifier for this manifest type */
  readonly type: string;

  /** File path relative to project root */
  readonly path: string;

  /** Absolute path of the manifest file */
  readonly fullPath: string;

  /** Check if this manifest file exists */
  exists(): Promise<boolean>;

  /** Read the project name, null if not set */
  getName(): Promise<string | null>;

  /** Read current version from manifest, null if not set */
  getVersion(): Promise<string | null>;

  /** Write new version to manifest */
  setVersion(version: string): Promise<void>;
}
