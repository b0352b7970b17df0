/**
 * Install directory creation (mkdir -p) and removal
 */

import { existsSync, mkdirSync, readdirSync, rmdirSync, statSync } from 'fs';
import { InstallerError, toInstallerError } from './errors.js';
import type { InstallDirResult } from './types.js';

export function isInstallDirPresent(dir: string): boolean {
  return existsSync(dir) && statSync(dir).isDirectory();
}

/**
 * Create the install directory if it does not exist yet
 *
 * @throws InstallerError if the path exists but is not a directory
 */
export function ensureInstallDir(dir: string, options: { dryRun?: boolean } = {}): InstallDirResult {
  if (existsSync(dir)) {
    if (!statSync(dir).isDirectory()) {
      throw new InstallerError(`${dir} exists but is not a directory`, {
        hint: `Move ${dir} out of the way and re-run the installer.`
      });
    }
    return { path: dir, created: false };
  }

  if (!options.dryRun) {
    try {
      mkdirSync(dir, { recursive: true, mode: 0o755 });
    } catch (error) {
      throw toInstallerError(error, 'creating', dir);
    }
  }

  return { path: dir, created: true };
}

/**
 * Remove the install directory when nothing else lives in it
 *
 * @param options.ignoring - Entries treated as already gone (dry runs)
 * @returns true when the directory was (or would be) removed
 */
export function removeInstallDirIfEmpty(
  dir: string,
  options: { dryRun?: boolean; ignoring?: string[] } = {}
): boolean {
  if (!isInstallDirPresent(dir)) {
    return false;
  }

  const ignoring = options.ignoring ?? [];
  const remaining = readdirSync(dir).filter(entry => !ignoring.includes(entry));
  if (remaining.length > 0) {
    return false;
  }

  if (!options.dryRun) {
    try {
      rmdirSync(dir);
    } catch (error) {
      throw toInstallerError(error, 'removing', dir);
    }
  }

  return true;
}
