/**
 * Shell command runner.
 *
 * Every command goes through the platform shell:
 *   windows: cmd.exe /D /C "<line>"  (no AutoRun, run then exit)
 *   others:  sh -c "<line>"
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { CommandResult } from '../domain/types.js';
import type { CommandRunner, RunOptions } from '../domain/vcs.js';
import { CancelledError, MaintenanceError } from '../lib/error.js';

/** The part of a child process the runner relies on. */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

export interface ShellRunnerOptions {
  cwd?: string;
  platform?: NodeJS.Platform;
  spawn?: SpawnFn;
}

const POSIX_SAFE = /^[A-Za-z0-9_/.,:=@%+-]+$/;
const WINDOWS_SAFE = /^[A-Za-z0-9_/\\.,:=@+-]+$/;
// cmd.exe has no escape for these inside a quoted argument
const WINDOWS_UNQUOTABLE = /["%!\r\n]/;

export function isWindows(platform: NodeJS.Platform): boolean {
  return platform === 'win32';
}

/**
 * Quote one argument for the target shell.
 *
 * On Windows an argument containing `"`, `%`, `!` or a line break is
 * rejected with `UNSAFE_ARGUMENT`: cmd.exe would end the quoting there or
 * expand variables inside it.
 */
export function quoteArgument(arg: string, platform: NodeJS.Platform): string {
  if (isWindows(platform)) {
    if (WINDOWS_SAFE.test(arg)) return arg;
    if (WINDOWS_UNQUOTABLE.test(arg)) {
      throw new MaintenanceError(
        `Argument cannot be passed to cmd.exe: ${arg}`,
        'UNSAFE_ARGUMENT',
        { arg },
      );
    }
    return `"${arg}"`;
  }
  return POSIX_SAFE.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function commandLine(args: readonly string[], platform: NodeJS.Platform): string {
  return args.map((arg) => quoteArgument(arg, platform)).join(' ');
}

/**
 * Wrap a command line for the platform shell.
 */
export function osSpecificCommand(line: string, platform: NodeJS.Platform): string[] {
  if (isWindows(platform)) {
    return ['cmd.exe', '/D', '/C', line];
  }
  return ['sh', '-c', line];
}

export class ShellRunner implements CommandRunner {
  private readonly cwd: string;
  private readonly platform: NodeJS.Platform;
  private readonly spawn: SpawnFn;

  constructor(options: ShellRunnerOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.platform = options.platform ?? process.platform;
    this.spawn = options.spawn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
  }

  /**
   * Run a command to completion, capturing stdout and stderr as one stream.
   * Resolves with the exit status whatever it is; rejects only when the
   * process cannot be started or the signal aborts it.
   */
  run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(`Cancelled before running: ${args.join(' ')}`));
    }

    let line: string;
    try {
      line = commandLine(args, this.platform);
    } catch (e) {
      return Promise.reject(e);
    }
    const [program, ...shellArgs] = osSpecificCommand(line, this.platform);

    return new Promise<CommandResult>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let settled = false;

      const child = this.spawn(program, shellArgs, {
        cwd: this.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsVerbatimArguments: isWindows(this.platform),
      });

      const onAbort = () => {
        child.kill();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const collect = (chunk: Buffer | string) => {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      };
      child.stdout?.on('data', collect);
      child.stderr?.on('data', collect);

      child.once('error', (error) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        reject(
          new MaintenanceError(
            `Could not run command: ${line}\n${error.message}`,
            'COMMAND_FAILED',
            { args, error: error.message },
          ),
        );
      });

      child.once('close', (code, exitSignal) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);

        // Ctrl-C reaches the child too, possibly before the abort does
        if (signal?.aborted || exitSignal === 'SIGINT') {
          reject(new CancelledError(`Cancelled while running: ${line}`));
          return;
        }

        resolve({
          // Terminated by a signal without an exit code
          exitCode: code ?? 1,
          output: Buffer.concat(chunks).toString('utf8'),
        });
      });
    });
  }
}
