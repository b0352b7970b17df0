/**
 * Interpreter directive handling for the installed script
 */

import { readFileSync, writeFileSync } from 'fs';
import { toInstallerError } from './errors.js';
import type { ShebangResult } from './types.js';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * First line of `content` without a leading byte order mark or its line ending
 */
export function firstLine(content: string): string {
  const text = content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content;
  const end = text.indexOf('\n');
  const line = end === -1 ? text : text.slice(0, end);
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * True when the first line is the directive, optionally followed by
 * interpreter arguments (`#!/usr/bin/env python3 -u`).
 */
export function hasShebang(content: string, directive: string): boolean {
  const line = firstLine(content);
  return line === directive || line.startsWith(`${directive} `);
}

/**
 * Prepend the directive when it is missing. The file is rewritten in
 * place, so its permissions are kept; the remaining bytes are untouched.
 */
export function ensureShebang(
  scriptPath: string,
  directive: string,
  options: { dryRun?: boolean } = {}
): ShebangResult {
  let bytes: Buffer;
  try {
    bytes = readFileSync(scriptPath);
  } catch (error) {
    throw toInstallerError(error, 'reading', scriptPath);
  }

  if (hasShebang(bytes.toString('utf-8'), directive)) {
    return { path: scriptPath, added: false };
  }

  if (!options.dryRun) {
    try {
      writeFileSync(scriptPath, Buffer.concat([Buffer.from(`${directive}\n`, 'utf-8'), bytes]));
    } catch (error) {
      throw toInstallerError(error, 'writing', scriptPath);
    }
  }

  return { path: scriptPath, added: true };
}
