// Main module exports for programmatic usage

export * from './lib/error.js';
export type * from './domain/types.js';
export type * from './domain/vcs.js';
export * from './domain/version.js';
export * from './domain/config.js';
export * from './clients/shell.js';
export { LocalGit } from './clients/git/local.js';
export * from './clients/git/tags.js';
export * from './manifest/mod.js';
export * from './workflows/maintenance.js';
export { VERSION } from './version_info.js';
