/**
 * Wrapper executable that runs the installed script through the interpreter
 */

import { chmodSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { toInstallerError } from './errors.js';
import type { WrapperResult } from './types.js';

export const WRAPPER_MODE = 0o755;

/**
 * Quote a path for bash only when it contains characters that need it
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./+-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render the two-line wrapper script
 *
 * @example
 * renderWrapper('python3', '/opt/gitAuto/gitauto.py')
 * // '#!/bin/bash\nexec python3 /opt/gitAuto/gitauto.py "$@"\n'
 */
export function renderWrapper(interpreter: string, scriptPath: string): string {
  return `#!/bin/bash\nexec ${interpreter} ${shellQuote(scriptPath)} "$@"\n`;
}

export function isWrapperUpToDate(wrapperPath: string, content: string): boolean {
  if (!existsSync(wrapperPath)) {
    return false;
  }

  try {
    return readFileSync(wrapperPath, 'utf-8') === content;
  } catch {
    // Unreadable counts as stale; writeWrapper reports the real failure
    return false;
  }
}

/**
 * Write the wrapper when it is missing or different, and make sure it is
 * executable either way.
 */
export function writeWrapper(
  wrapperPath: string,
  content: string,
  options: { dryRun?: boolean } = {}
): WrapperResult {
  const alreadyUpToDate = isWrapperUpToDate(wrapperPath, content);

  if (options.dryRun) {
    return { path: wrapperPath, written: !alreadyUpToDate, alreadyUpToDate };
  }

  try {
    if (!alreadyUpToDate) {
      const dir = dirname(wrapperPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      writeFileSync(wrapperPath, content, { encoding: 'utf-8', mode: WRAPPER_MODE });
    }
    chmodSync(wrapperPath, WRAPPER_MODE);
  } catch (error) {
    throw toInstallerError(error, 'writing', wrapperPath);
  }

  return { path: wrapperPath, written: !alreadyUpToDate, alreadyUpToDate };
}

/**
 * @returns true when a wrapper was removed
 */
export function removeWrapper(wrapperPath: string, options: { dryRun?: boolean } = {}): boolean {
  if (!existsSync(wrapperPath)) {
    return false;
  }

  if (!options.dryRun) {
    try {
      rmSync(wrapperPath, { force: true });
    } catch (error) {
      throw toInstallerError(error, 'removing', wrapperPath);
    }
  }

  return true;
}
