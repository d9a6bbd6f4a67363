/**
 * CLI output formatting.
 *
 * Consistent, scannable output with prefixes.
 */

import pc from 'picocolors';
import type { Logger } from '../domain/vcs.js';

export const { bold, cyan, dim, green, red, yellow } = pc;

let verbose = false;

/**
 * Show debug lines (command output) from now on.
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/**
 * Print section header.
 */
export function header(text: string): void {
  console.log(bold(text));
  console.log();
}

/**
 * Print info line.
 */
export function info(label: string, value: string): void {
  console.log(`${label}: ${cyan(value)}`);
}

/**
 * Print success message.
 */
export function success(message: string): void {
  console.log(green(`✅ ${message}`));
}

/**
 * Print warning message.
 */
export function warn(message: string): void {
  console.log(yellow(`⚠️  ${message}`));
}

/**
 * Print error message.
 */
export function error(message: string, details?: string): void {
  console.error(red(`❌ ${message}`));
  if (details) {
    console.error(red(`   ${details}`));
  }
}

export function debug(message: string): void {
  if (verbose) {
    console.error(dim(message.trimEnd()));
  }
}

/**
 * Print help text.
 */
export function help(text: string): void {
  console.log(text);
}

/** Workflow progress goes to stdout, command output to stderr when verbose. */
export const logger: Logger = {
  info: (message) => console.log(message),
  debug,
};
