/**
 * Thin wrappers over child_process for PATH lookups and privileged commands
 */

import { execFileSync, spawnSync, type StdioOptions } from 'child_process';
import { logger } from './logger.js';
import { COMMAND_NAME_PATTERN } from './schemas.js';

/**
 * Resolve a command the way `command -v` does in /bin/sh.
 *
 * @returns The resolved path, or null when the command is not found
 * @throws Error if the name is not a plain command name
 */
export function commandPath(command: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (!COMMAND_NAME_PATTERN.test(command)) {
    throw new Error(`Invalid command name: "${command}"`);
  }

  try {
    const output = execFileSync('/bin/sh', ['-c', 'command -v "$1"', 'sh', command], {
      encoding: 'utf-8',
      stdio: 'pipe',
      env
    });
    const resolved = output.trim();
    return resolved.length > 0 ? resolved : null;
  } catch (error) {
    logger.debug(`${command} not found on PATH`, error instanceof Error ? error.message : String(error));
    return null;
  }
}

export function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

export interface RunPrivilegedOptions {
  /** Override the uid check */
  asRoot?: boolean;
  /** Send the child's stdout to our stderr, keeping stdout for machine-readable output */
  outputToStderr?: boolean;
}

/**
 * Run a command with elevated privileges, streaming its output to the
 * terminal. Uses sudo unless the process already runs as root.
 *
 * @returns The exit status (1 when the process was killed by a signal)
 */
export function runPrivileged(command: string, args: string[], options: RunPrivilegedOptions = {}): number {
  const asRoot = options.asRoot ?? isRoot();
  const file = asRoot ? command : 'sudo';
  const argv = asRoot ? args : [command, ...args];
  const stdio: StdioOptions = options.outputToStderr ? ['inherit', 2, 'inherit'] : 'inherit';

  logger.info(`Running: ${[file, ...argv].join(' ')}`);
  const result = spawnSync(file, argv, { stdio });

  if (result.error) {
    throw result.error;
  }

  return result.status ?? 1;
}
