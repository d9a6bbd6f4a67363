import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Manifest } from './interface.js';
import { fileExists, readJsonField, replaceJsonVersion } from './json.js';

/**
 * Manifest handler for package.json files.
 *
 * Preserves formatting by using regex replacement.
 */
export class NodeManifest implements Manifest {
  readonly type = 'node';
  readonly path = 'package.json';
  private readonly root: string;

  constructor(root: string = process.cwd()) {
    this.root = root;
  }

  get fullPath(): string {
    return join(this.root, this.path);
  }

  async exists(): Promise<boolean> {
    return await fileExists(this.fullPath);
  }

  async getName(): Promise<string | null> {
    return await readJsonField(this.fullPath, 'name');
  }

  async getVersion(): Promise<string | null> {
    return await readJsonField(this.fullPath, 'version');
  }

  async setVersion(version: string): Promise<void> {
    const content = await readFile(this.fullPath, 'utf8');
    await writeFile(this.fullPath, replaceJsonVersion(content, version));
  }
}

/**
 * Create a NodeManifest if package.json exists
 */
export async function createNodeManifest(root: string = process.cwd()): Promise<NodeManifest | null> {
  const manifest = new NodeManifest(root);
  if (await manifest.exists()) {
    return manifest;
  }
  return null;
}
