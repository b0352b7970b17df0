/**
 * Configuration management for gitauto-installer
 *
 * User overrides are stored in ~/.gitauto-installer/config.json and merged
 * over DEFAULT_INSTALLER_CONFIG. Only keys present in the file are
 * overrides; the file is never required.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join as pathJoin } from 'path';
import { homedir } from 'os';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import {
  InstallerConfigSchema,
  SETTABLE_FIELDS,
  SETTABLE_KEYS,
  formatIssues,
  isSettableKey,
  type InstallerConfig,
  type SettableKey
} from './schemas.js';

/**
 * Default installation layout
 */
export const DEFAULT_INSTALLER_CONFIG: InstallerConfig = {
  installDir: '/opt/gitAuto',
  scriptName: 'gitauto.py',
  binDir: '/usr/local/bin',
  commandName: 'gitauto',
  interpreter: 'python3',
  shebang: '#!/usr/bin/env python3',
  dependencies: [
    { command: 'python3', package: 'python3', label: 'Python' },
    { command: 'git', package: 'git', label: 'Git' }
  ]
};

export const CONFIG_PATH_ENV = 'GITAUTO_INSTALLER_CONFIG';

export const PASSWD_FILE = '/etc/passwd';

/**
 * Home directory of the user who ran `sudo`, looked up in the passwd file.
 * sudo resets HOME to root's, which would hide that user's settings.
 *
 * @returns null when not running under sudo or the user has no entry
 */
export function sudoUserHome(env: NodeJS.ProcessEnv = process.env, passwdFile: string = PASSWD_FILE): string | null {
  const user = env.SUDO_USER;
  if (!user || user === 'root') {
    return null;
  }

  let passwd: string;
  try {
    passwd = readFileSync(passwdFile, 'utf-8');
  } catch (err) {
    logger.debug(`Could not read ${passwdFile}`, err instanceof Error ? err.message : String(err));
    return null;
  }

  for (const line of passwd.split('\n')) {
    // name:password:uid:gid:gecos:home:shell
    const fields = line.split(':');
    if (fields.length >= 7 && fields[0] === user && fields[5].length > 0) {
      return fields[5];
    }
  }

  logger.debug(`No passwd entry for SUDO_USER ${user}`);
  return null;
}

/**
 * Default config file path: ~/.gitauto-installer/config.json of the
 * invoking user, also under sudo
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env, passwdFile: string = PASSWD_FILE): string {
  const home = sudoUserHome(env, passwdFile) ?? homedir();
  return pathJoin(home, '.gitauto-installer', 'config.json');
}

export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicitPath ?? env[CONFIG_PATH_ENV] ?? defaultConfigPath(env);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ConfigManager - Manages persistent installer configuration
 *
 * Features:
 * - JSON file storage, directory created on first write
 * - Corrupted files are backed up and replaced by defaults
 * - Values validated against InstallerConfigSchema
 */
export class ConfigManager {
  private configPath: string;
  private overrides: Record<string, unknown>;

  /**
   * @param configPath - Path to config file (default: ~/.gitauto-installer/config.json)
   */
  constructor(configPath: string = resolveConfigPath()) {
    this.configPath = this.resolvePath(configPath);
    this.overrides = this.load();
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Resolve tilde in path to home directory
   */
  private resolvePath(path: string): string {
    if (path.startsWith('~')) {
      return path.replace('~', homedir());
    }
    return path;
  }

  private load(): Record<string, unknown> {
    if (!existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      this.backupCorrupted(err);
      return {};
    }

    if (!isPlainObject(parsed)) {
      this.backupCorrupted(new Error('top-level value is not an object'));
      return {};
    }

    return parsed;
  }

  private backupCorrupted(reason: unknown): void {
    const backupPath = `${this.configPath}.corrupted.${Date.now()}`;
    try {
      copyFileSync(this.configPath, backupPath);
      logger.warn(`Config file was unreadable. Backed up to: ${backupPath}`);
    } catch (err) {
      logger.error(`Config file is unreadable and could not be backed up`, err);
    }
    logger.debug('Config parse failure', reason instanceof Error ? reason.message : String(reason));
  }

  private save(): void {
    const dir = dirname(this.configPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(this.configPath, JSON.stringify(this.overrides, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate that a key is safe and one of the settable keys
   */
  private validateKey(key: string): asserts key is SettableKey {
    // Prevent prototype pollution attacks
    const dangerousKeys = ['__proto__', 'constructor', 'prototype'];
    if (dangerousKeys.includes(key)) {
      throw new Error(`Invalid config key: "${key}" is a reserved property`);
    }

    if (key.startsWith('_')) {
      throw new Error(`Invalid config key: keys starting with underscore are reserved`);
    }

    if (!isSettableKey(key)) {
      throw new Error(`Unknown config key "${key}". Valid keys: ${SETTABLE_KEYS.join(', ')}`);
    }
  }

  /**
   * Defaults merged with the file's overrides, validated
   *
   * @throws ConfigError if the merged configuration is invalid
   */
  getInstallerConfig(): InstallerConfig {
    const result = InstallerConfigSchema.safeParse({
      ...structuredClone(DEFAULT_INSTALLER_CONFIG),
      ...this.overrides
    });

    if (!result.success) {
      throw new ConfigError(`Invalid configuration in ${this.configPath}: ${formatIssues(result.error)}`, this.configPath);
    }

    return result.data;
  }

  /**
   * Get an effective config value
   *
   * @returns Value or undefined for unknown keys
   */
  get(key: string): unknown {
    if (!Object.prototype.hasOwnProperty.call(DEFAULT_INSTALLER_CONFIG, key)) {
      return undefined;
    }
    const merged: Record<string, unknown> = { ...DEFAULT_INSTALLER_CONFIG, ...this.overrides };
    return merged[key];
  }

  /**
   * Set a config value and write the file
   *
   * @throws Error if the key is unknown/reserved or the value is invalid
   */
  set(key: string, value: string): void {
    this.validateKey(key);

    const result = SETTABLE_FIELDS[key].safeParse(value);
    if (!result.success) {
      throw new Error(`Invalid value for ${key}: ${formatIssues(result.error)}`);
    }

    this.overrides[key] = result.data;
    this.save();
  }

  /**
   * Remove an override, restoring the default
   */
  delete(key: string): void {
    this.validateKey(key);

    if (!(key in this.overrides)) {
      return;
    }

    delete this.overrides[key];
    this.save();
  }

  /**
   * Overrides stored in the file (returns a copy)
   */
  getOverrides(): Record<string, unknown> {
    return structuredClone(this.overrides);
  }

  /**
   * Effective configuration without validation (returns a copy)
   */
  getAll(): Record<string, unknown> {
    return structuredClone({ ...DEFAULT_INSTALLER_CONFIG, ...this.overrides });
  }
}
