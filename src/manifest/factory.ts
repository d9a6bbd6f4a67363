import type { ManifestType } from '../domain/config.js';
import type { Manifest } from './interface.js';
import { createDenoManifest } from './deno.js';
import { createNodeManifest } from './node.js';
import { createPomManifest } from './pom.js';

/**
 * Detect and create appropriate manifest for a directory
 */
export async function createManifest(
  root: string = process.cwd(),
  type: ManifestType = 'auto',
): Promise<Manifest | null> {
  if (type === 'pom') {
    return createPomManifest(root);
  }

  if (type === 'deno') {
    return createDenoManifest(root);
  }

  if (type === 'node') {
    return createNodeManifest(root);
  }

  // Auto-detect: pom.xml, then deno.json, then package.json
  const pom = await createPomManifest(root);
  if (pom) return pom;

  const deno = await createDenoManifest(root);
  if (deno) return deno;

  return createNodeManifest(root);
}

/**
 * Project id used as tag and branch prefix: the manifest name without
 * an npm scope (@acme/widget → widget).
 */
export function projectIdFromName(name: string): string {
  const slash = name.lastIndexOf('/');
  return name.startsWith('@') && slash !== -1 ? name.slice(slash + 1) : name;
}
