/**
 * Copy the tool script into the install directory
 */

import { chmodSync, copyFileSync, existsSync, rmSync, statSync } from 'fs';
import { basename, resolve } from 'path';
import { MissingScriptError, toInstallerError } from './errors.js';
import type { ScriptCopyResult, ScriptSource } from './types.js';

export const SCRIPT_MODE = 0o755;

export function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Decide where the script comes from: the working directory copy wins,
 * an earlier installation is reused, otherwise it is missing.
 */
export function resolveScriptSource(sourcePath: string, targetPath: string): ScriptSource {
  if (isFile(sourcePath)) {
    return 'local';
  }
  if (isFile(targetPath)) {
    return 'installed';
  }
  return 'missing';
}

/**
 * Copy (overwrite) the script and mark it executable
 *
 * @throws MissingScriptError if neither the source nor a previous install exists
 */
export function copyScript(
  sourcePath: string,
  targetPath: string,
  options: { dryRun?: boolean } = {}
): ScriptCopyResult {
  const source = resolveScriptSource(sourcePath, targetPath);

  if (source === 'missing') {
    throw new MissingScriptError(basename(sourcePath));
  }

  if (source === 'installed') {
    return { path: targetPath, source, copied: false, reusedExisting: true };
  }

  if (!options.dryRun) {
    try {
      // Running from inside the install directory: nothing to copy
      if (resolve(sourcePath) !== resolve(targetPath)) {
        copyFileSync(sourcePath, targetPath);
      }
      chmodSync(targetPath, SCRIPT_MODE);
    } catch (error) {
      throw toInstallerError(error, 'copying script to', targetPath);
    }
  }

  return { path: targetPath, source, copied: true, reusedExisting: false };
}

/**
 * @returns true when an installed script was removed
 */
export function removeScript(targetPath: string, options: { dryRun?: boolean } = {}): boolean {
  if (!isFile(targetPath)) {
    return false;
  }

  if (!options.dryRun) {
    try {
      rmSync(targetPath, { force: true });
    } catch (error) {
      throw toInstallerError(error, 'removing', targetPath);
    }
  }

  return true;
}
