import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Manifest } from './interface.js';
import { fileExists, readJsonField, replaceJsonVersion } from './json.js';

/**
 * Manifest handler for deno.json / deno.jsonc files.
 *
 * Preserves formatting by using regex replacement instead of
 * JSON.parse/stringify which would lose comments and formatting.
 */
export class DenoManifest implements Manifest {
  readonly type = 'deno';
  readonly path: string;
  private readonly root: string;

  constructor(root: string = process.cwd(), filename: string = 'deno.json') {
    this.root = root;
    this.path = filename;
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
 * Create a DenoManifest, checking for both deno.json and deno.jsonc
 */
export async function createDenoManifest(root: string = process.cwd()): Promise<DenoManifest | null> {
  // Try deno.json first, then deno.jsonc
  for (const filename of ['deno.json', 'deno.jsonc']) {
    const manifest = new DenoManifest(root, filename);
    if (await manifest.exists()) {
      return manifest;
    }
  }
  return null;
}
