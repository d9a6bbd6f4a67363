/**
 * Shared test helpers.
 *
 * Provides a scripted command runner, an in-memory logger and stand-ins for
 * the release lookup and version setter, so workflows run without git.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandResult, ReleaseComponents } from '../src/domain/types.js';
import type {
  CommandRunner,
  LatestReleaseLookup,
  Logger,
  RunOptions,
  SetVersionOptions,
  VersionSetter,
} from '../src/domain/vcs.js';
import { CancelledError } from '../src/lib/error.js';

type Script = CommandResult | ((args: string[]) => CommandResult);

/**
 * Runner answering each command line from a script keyed by `args.join(' ')`.
 * Unscripted commands succeed with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: string[][] = [];
  private readonly scripts = new Map<string, Script>();
  /** Abort this controller when the matching command starts */
  private abortOn: { command: string; controller: AbortController } | null = null;

  on(command: string, result: Script): this {
    this.scripts.set(command, result);
    return this;
  }

  abortWhen(command: string, controller: AbortController): this {
    this.abortOn = { command, controller };
    return this;
  }

  get commands(): string[] {
    return this.calls.map((args) => args.join(' '));
  }

  run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const command = args.join(' ');
    if (options.signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    this.calls.push(args);

    if (this.abortOn && this.abortOn.command === command) {
      this.abortOn.controller.abort();
      return Promise.reject(new CancelledError());
    }

    const script = this.scripts.get(command);
    if (!script) {
      return Promise.resolve({ exitCode: 0, output: '' });
    }
    return Promise.resolve(typeof script === 'function' ? script(args) : script);
  }
}

export class MemoryLogger implements Logger {
  readonly infos: string[] = [];
  readonly debugs: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  debug(message: string): void {
    this.debugs.push(message);
  }
}

export class FakeReleaseLookup implements LatestReleaseLookup {
  calls = 0;

  constructor(private readonly release: ReleaseComponents | null) {}

  findLatestRelease(): Promise<ReleaseComponents | null> {
    this.calls++;
    return Promise.resolve(this.release);
  }
}

export class FakeVersionSetter implements VersionSetter {
  readonly calls: Array<{ version: string; options: SetVersionOptions }> = [];

  constructor(private readonly failure: Error | null = null) {}

  setVersion(version: string, options: SetVersionOptions): Promise<void> {
    this.calls.push({ version, options });
    return this.failure ? Promise.reject(this.failure) : Promise.resolve();
  }
}

/**
 * Await a promise that must reject and return its reason.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error('Expected promise to reject');
}

/**
 * Create a temp directory, removed by the returned cleanup.
 */
export async function createTempDir(): Promise<{
  dir: string;
  cleanup: () => Promise<void>;
}> {
  const dir = await mkdtemp(join(tmpdir(), 'maint-test-'));

  const cleanup = async () => {
    await rm(dir, { recursive: true, force: true });
  };

  return { dir, cleanup };
}
