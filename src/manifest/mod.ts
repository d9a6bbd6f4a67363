export type { Manifest } from './interface.js';
export { createNodeManifest, NodeManifest } from './node.js';
export { createDenoManifest, DenoManifest } from './deno.js';
export { createPomManifest, PomManifest, topLevelElements } from './pom.js';
export { createManifest, projectIdFromName } from './factory.js';
export { BACKUP_SUFFIX, ManifestVersionSetter } from './setter.js';
