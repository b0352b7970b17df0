/**
 * System dependency checks and apt-get installation
 */

import { PackageInstallError } from './errors.js';
import { logger } from './logger.js';
import { commandPath, runPrivileged } from './shell.js';
import type { DependencyResult, DependencySpec } from './types.js';

export interface EnsureDependenciesOptions {
  /** Report missing dependencies without installing them */
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Called with the missing dependencies before anything is installed */
  onMissing?: (missing: DependencyResult[]) => void;
  /** Route apt-get's stdout to stderr */
  outputToStderr?: boolean;
}

export function isCommandAvailable(command: string, env: NodeJS.ProcessEnv = process.env): boolean {
  return commandPath(command, env) !== null;
}

/**
 * Check every dependency without installing anything
 */
export function checkDependencies(
  specs: DependencySpec[],
  env: NodeJS.ProcessEnv = process.env
): DependencyResult[] {
  return specs.map(spec => ({
    ...spec,
    alreadyInstalled: isCommandAvailable(spec.command, env),
    installed: false
  }));
}

/**
 * Install packages with apt-get. The package index is refreshed once
 * before the first install.
 *
 * @throws PackageInstallError if apt-get exits non-zero
 */
export function installPackages(packages: string[], options: { outputToStderr?: boolean } = {}): void {
  if (packages.length === 0) {
    return;
  }

  const runOptions = { outputToStderr: options.outputToStderr ?? false };
  const updateStatus = runPrivileged('apt-get', ['update'], runOptions);
  if (updateStatus !== 0) {
    throw new PackageInstallError(`apt-get update failed with exit code ${updateStatus}`, packages);
  }

  for (const pkg of packages) {
    const status = runPrivileged('apt-get', ['install', '-y', pkg], runOptions);
    if (status !== 0) {
      throw new PackageInstallError(`apt-get install ${pkg} failed with exit code ${status}`, packages);
    }
  }
}

/**
 * Check each dependency and install the missing ones.
 *
 * When everything is present no package manager process is started.
 * Dependencies still missing after installation carry an `error`.
 */
export function ensureDependencies(
  specs: DependencySpec[],
  options: EnsureDependenciesOptions = {}
): DependencyResult[] {
  const { dryRun = false, env = process.env, onMissing, outputToStderr = false } = options;

  const results = checkDependencies(specs, env);
  const missing = results.filter(result => !result.alreadyInstalled);

  if (missing.length === 0) {
    return results;
  }

  onMissing?.(missing);
  if (dryRun) {
    return results;
  }

  const packages = [...new Set(missing.map(result => result.package))];
  logger.info(`Installing missing packages: ${packages.join(', ')}`);
  installPackages(packages, { outputToStderr });

  for (const result of missing) {
    result.installed = isCommandAvailable(result.command, env);
    if (!result.installed) {
      result.error = `${result.label} is still not available after installing ${result.package}`;
    }
  }

  return results;
}
