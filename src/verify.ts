/**
 * Post-install check that the command resolves on PATH
 */

import { delimiter, resolve } from 'path';
import { commandPath } from './shell.js';
import type { VerificationResult } from './types.js';

export function isDirOnPath(dir: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const target = resolve(dir);
  return (env.PATH ?? '')
    .split(delimiter)
    .filter(entry => entry.length > 0)
    .some(entry => resolve(entry) === target);
}

export function verifyCommand(
  commandName: string,
  binDir: string,
  env: NodeJS.ProcessEnv = process.env
): VerificationResult {
  const resolvedPath = commandPath(commandName, env);
  return {
    available: resolvedPath !== null,
    resolvedPath,
    binDirOnPath: isDirOnPath(binDir, env)
  };
}

/**
 * Operator hint for a failed verification
 */
export function verificationHint(result: VerificationResult, binDir: string): string | undefined {
  if (!result.available && !result.binDirOnPath) {
    return `${binDir} is not on your PATH. Add it to PATH in your shell profile.`;
  }
  return undefined;
}
