#!/usr/bin/env node

/**
 * maint - Maintenance branch CLI
 *
 * Branches off a released version and prepares it for development:
 *   maint                       Branch from the latest release tag
 *   maint --base-version 2.3.5  Branch from foo-2.3.5 as foo-2.3.x
 */

import { readFile, realpath } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import minimist from 'minimist';
import { ShellRunner } from '../clients/shell.js';
import { LocalGit } from '../clients/git/local.js';
import { TagReleaseLookup } from '../clients/git/tags.js';
import { CONFIG_PATH, loadConfig } from '../domain/config.js';
import { createManifest, projectIdFromName } from '../manifest/factory.js';
import { ManifestVersionSetter } from '../manifest/setter.js';
import { createMaintenanceBranch } from '../workflows/maintenance.js';
import { MaintenanceError } from '../lib/error.js';
import { VERSION } from '../version_info.js';
import * as output from './output.js';

const HELP = `
${output.bold('maint')} - Create a maintenance branch from a released version

${output.bold('USAGE:')}
  maint [OPTIONS]

${output.bold('OPTIONS:')}
  --base-version <v>   Release to branch from (major.minor[.incremental]).
                       Defaults to the latest <project>-<version> tag.
  --project <id>       Tag and branch prefix (default: manifest name)
  --cwd <dir>          Project root (default: current directory)
  --verbose            Show git output
  --help               Show this help
  --version            Show version

${output.bold('EXAMPLES:')}
  maint --base-version 2.3     # foo-2.3   → foo-2.3.x at 2.3.1-SNAPSHOT
  maint --base-version 2.3.5   # foo-2.3.5 → foo-2.3.x at 2.3.6-SNAPSHOT
`;

/** Exit status for a run stopped by SIGINT */
export const EXIT_CANCELLED = 130;

export interface CliOptions {
  baseVersion: string | null;
  projectId: string | null;
  cwd: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

function stringOption(value: unknown, flag: string): string | null {
  if (value === undefined) return null;
  if (typeof value !== 'string' || value === '') {
    throw new MaintenanceError(`--${flag} requires a value`, 'INVALID_ARGUMENT', {
      flag,
    });
  }
  return value;
}

export function parseCliArgs(args: string[]): CliOptions {
  const parsed = minimist(args, {
    boolean: ['help', 'version', 'verbose'],
    string: ['base-version', 'project', 'cwd'],
  });

  return {
    baseVersion: stringOption(parsed['base-version'], 'base-version'),
    projectId: stringOption(parsed.project, 'project'),
    cwd: resolve(stringOption(parsed.cwd, 'cwd') ?? process.cwd()),
    verbose: parsed.verbose === true,
    help: parsed.help === true,
    version: parsed.version === true,
  };
}

/**
 * Read a file that may be absent; any other read failure is an error.
 */
async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return null;
    }
    throw new MaintenanceError(
      `Could not read ${path}: ${e instanceof Error ? e.message : String(e)}`,
      'CONFIG_READ_ERROR',
      { path },
    );
  }
}

async function handleMaintenance(options: CliOptions, signal?: AbortSignal): Promise<number> {
  output.setVerbose(options.verbose);
  output.header('🌿 maint');

  const config = loadConfig(await readOptional(join(options.cwd, CONFIG_PATH)));
  const manifest = await createManifest(options.cwd, config.manifest);
  const manifestName = manifest ? await manifest.getName() : null;

  const projectId = options.projectId ?? config.projectId ??
    (manifestName ? projectIdFromName(manifestName) : null);
  if (!projectId) {
    throw new MaintenanceError(
      `Could not determine the project id. Use --project or set projectId in ${CONFIG_PATH}`,
      'NO_PROJECT_ID',
      { cwd: options.cwd, manifest: manifest?.path ?? null },
    );
  }

  output.info('Project', projectId);
  if (manifest) {
    output.info('Manifest', manifest.path);
  }

  const git = new LocalGit(new ShellRunner({ cwd: options.cwd }), output.logger);
  const result = await createMaintenanceBranch(
    {
      git,
      releases: new TagReleaseLookup(git, projectId),
      versionSetter: new ManifestVersionSetter(options.cwd, config.manifest),
      logger: output.logger,
    },
    {
      projectId,
      baseVersion: options.baseVersion,
      keepBackups: config.keepBackups,
      signal,
    },
  );

  if (result.status === 'cancelled') {
    output.warn(`Cancelled during ${result.step}`);
    return EXIT_CANCELLED;
  }

  console.log();
  if (result.usedFallbackTag) {
    console.log(output.yellow(`   (tag ${result.names.tagName} not found, used ${result.tagUsed})`));
  }
  output.success(
    `Created ${result.names.branchName} from ${result.tagUsed} at ${result.names.branchVersion}`,
  );
  return 0;
}

/**
 * Run the CLI and return the process exit status.
 */
export async function run(args: string[], signal?: AbortSignal): Promise<number> {
  try {
    const options = parseCliArgs(args);

    if (options.help) {
      output.help(HELP);
      return 0;
    }

    if (options.version) {
      console.log(`maint v${VERSION}`);
      return 0;
    }

    return await handleMaintenance(options, signal);
  } catch (error) {
    if (error instanceof MaintenanceError) {
      output.error(error.message);
      if (error.details) {
        console.error(output.red('Details:'), error.details);
      }
    } else {
      output.error('Unexpected error', String(error));
    }
    return 1;
  }
}

async function isEntryPoint(): Promise<boolean> {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return (await realpath(script)) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (await isEntryPoint()) {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  process.exitCode = await run(process.argv.slice(2), controller.signal);
}
