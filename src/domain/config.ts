/**
 * Configuration management for maint.
 *
 * Reads .maint/config.json and provides sensible defaults.
 * Convention over configuration - most projects won't need a config file.
 */

import { MaintenanceError } from '../lib/error.js';

export const CONFIG_PATH = '.maint/config.json';

export type ManifestType = 'node' | 'deno' | 'pom' | 'auto';

const MANIFEST_TYPES: readonly ManifestType[] = ['node', 'deno', 'pom', 'auto'];

/**
 * maint configuration schema.
 */
export interface MaintConfig {
  /** Tag and branch prefix (default: manifest name without npm scope) */
  projectId?: string;
  /** Which manifest holds the declared version (default: auto) */
  manifest: ManifestType;
  /** Keep a copy of each rewritten manifest (default: false) */
  keepBackups: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MaintConfig = {
  manifest: 'auto',
  keepBackups: false,
};

function isManifestType(value: unknown): value is ManifestType {
  return MANIFEST_TYPES.some((type) => type === value);
}

/**
 * Parse and validate configuration from JSON content.
 */
export function parseConfig(content: string): Partial<MaintConfig> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    throw new MaintenanceError(
      `Invalid ${CONFIG_PATH}: not valid JSON`,
      'CONFIG_PARSE_ERROR',
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MaintenanceError(
      `Invalid ${CONFIG_PATH}: expected an object`,
      'CONFIG_PARSE_ERROR',
    );
  }

  const config: Partial<MaintConfig> = {};

  if ('projectId' in parsed) {
    if (typeof parsed.projectId !== 'string' || parsed.projectId === '') {
      throw new MaintenanceError(
        'Invalid config: projectId must be a non-empty string',
        'CONFIG_VALIDATION_ERROR',
        { field: 'projectId', value: parsed.projectId },
      );
    }
    config.projectId = parsed.projectId;
  }

  if ('manifest' in parsed) {
    if (!isManifestType(parsed.manifest)) {
      throw new MaintenanceError(
        'Invalid config: manifest must be "node", "deno", "pom" or "auto"',
        'CONFIG_VALIDATION_ERROR',
        { field: 'manifest', value: parsed.manifest },
      );
    }
    config.manifest = parsed.manifest;
  }

  if ('keepBackups' in parsed) {
    if (typeof parsed.keepBackups !== 'boolean') {
      throw new MaintenanceError(
        'Invalid config: keepBackups must be a boolean',
        'CONFIG_VALIDATION_ERROR',
        { field: 'keepBackups', value: parsed.keepBackups },
      );
    }
    config.keepBackups = parsed.keepBackups;
  }

  return config;
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<MaintConfig>): MaintConfig {
  return { ...DEFAULT_CONFIG, ...partial };
}

/**
 * Load configuration from content, with defaults.
 */
export function loadConfig(content: string | null): MaintConfig {
  if (!content) {
    return DEFAULT_CONFIG;
  }

  return mergeConfig(parseConfig(content));
}
