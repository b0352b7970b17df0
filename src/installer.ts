/**
 * gitauto installer
 *
 * Runs the installation as a fixed sequence of idempotent steps:
 * dependencies, source preflight, install directory, script copy,
 * interpreter directive, wrapper command, PATH verification. Every step
 * checks the current state before changing it, so running the installer
 * twice leaves the same end state.
 *
 * Also provides uninstall and a read-only status check.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { basename, join, resolve } from 'path';
import { ensureDependencies, checkDependencies } from './dependencies.js';
import {
  CommandNotFoundError,
  InstallerError,
  MissingScriptError,
  PackageInstallError
} from './errors.js';
import { ensureInstallDir, isInstallDirPresent, removeInstallDirIfEmpty } from './install-dir.js';
import { logger } from './logger.js';
import { copyScript, isFile, removeScript, resolveScriptSource } from './script-copy.js';
import { ensureShebang, hasShebang } from './shebang.js';
import { isWrapperUpToDate, removeWrapper, renderWrapper, writeWrapper } from './wrapper.js';
import { verificationHint, verifyCommand } from './verify.js';
import type {
  FileStatus,
  InstallerConfig,
  InstallPaths,
  InstallResult,
  InstallStatus,
  InstallStep,
  ProgressListener,
  UninstallResult
} from './types.js';

export interface InstallOptions {
  config: InstallerConfig;
  /** Script to install (defaults to <cwd>/<scriptName>) */
  sourcePath?: string;
  /** Directory the source is looked up in (defaults to process.cwd()) */
  cwd?: string;
  /** Do not check or install system dependencies */
  skipDependencies?: boolean;
  /** Report what would change without writing anything */
  dryRun?: boolean;
  /** Keep stdout free of package manager output (JSON mode) */
  outputToStderr?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface UninstallOptions {
  config: InstallerConfig;
  dryRun?: boolean;
}

export function getInstallPaths(config: InstallerConfig): InstallPaths {
  return {
    scriptPath: join(config.installDir, config.scriptName),
    wrapperPath: join(config.binDir, config.commandName)
  };
}

function toFailure(error: unknown): InstallerError {
  if (error instanceof InstallerError) {
    return error;
  }
  return new InstallerError(error instanceof Error ? error.message : String(error), { cause: error });
}

/**
 * Install the tool script and its wrapper command
 *
 * @param onProgress - Receives one event per step transition
 * @returns Result of the installation; never throws
 */
export function runInstall(options: InstallOptions, onProgress: ProgressListener = () => {}): InstallResult {
  const {
    config,
    cwd = process.cwd(),
    skipDependencies = false,
    dryRun = false,
    outputToStderr = false,
    env = process.env
  } = options;

  const sourcePath = resolve(cwd, options.sourcePath ?? config.scriptName);
  const paths = getInstallPaths(config);
  const result: InstallResult = {
    success: false,
    dryRun,
    exitCode: 1,
    paths,
    dependencies: []
  };

  let step: InstallStep = 'dependencies';

  try {
    // Step 1: runtime and version-control dependencies
    if (skipDependencies) {
      onProgress({ step, status: 'skipped', message: 'Dependency checks skipped.' });
    } else {
      onProgress({ step, status: 'started', message: 'Checking system dependencies...' });
      result.dependencies = ensureDependencies(config.dependencies, {
        dryRun,
        env,
        outputToStderr,
        onMissing: missing => {
          for (const dependency of missing) {
            const action = dryRun ? `Would install ${dependency.package}.` : `Installing ${dependency.package}...`;
            onProgress({ step, status: 'started', message: `${dependency.label} is not installed. ${action}` });
          }
        }
      });

      for (const dependency of result.dependencies) {
        if (dependency.error) {
          throw new PackageInstallError(dependency.error, [dependency.package]);
        }
        if (dependency.alreadyInstalled) {
          onProgress({ step, status: 'ok', message: `${dependency.label} is already installed.` });
        } else if (dependency.installed) {
          onProgress({ step, status: 'changed', message: `${dependency.label} installed successfully.` });
        }
      }
    }

    // Step 2: nothing is written unless there is a script to install
    step = 'preflight';
    if (resolveScriptSource(sourcePath, paths.scriptPath) === 'missing') {
      throw new MissingScriptError(basename(sourcePath));
    }

    // Step 3: install directory
    step = 'directory';
    onProgress({ step, status: 'started', message: 'Creating install directory...' });
    const directory = ensureInstallDir(config.installDir, { dryRun });
    result.directory = directory;
    onProgress(
      directory.created
        ? { step, status: 'changed', message: `Directory created: ${directory.path}` }
        : { step, status: 'ok', message: `Directory already exists: ${directory.path}` }
    );

    // Step 4: script copy
    step = 'script';
    onProgress({ step, status: 'started', message: `Copying ${config.scriptName} to ${config.installDir}...` });
    const script = copyScript(sourcePath, paths.scriptPath, { dryRun });
    result.script = script;
    onProgress(
      script.copied
        ? { step, status: 'changed', message: `${config.scriptName} copied successfully.` }
        : { step, status: 'ok', message: `${config.scriptName} already exists in ${config.installDir}.` }
    );

    // Step 5: interpreter directive
    step = 'shebang';
    onProgress({ step, status: 'started', message: `Checking interpreter directive in ${config.scriptName}...` });
    // A dry run never copied the script, so inspect the file that would be
    const shebangSubject = dryRun && script.copied ? sourcePath : paths.scriptPath;
    const shebang = ensureShebang(shebangSubject, config.shebang, { dryRun });
    result.shebang = { path: paths.scriptPath, added: shebang.added };
    onProgress(
      shebang.added
        ? { step, status: 'changed', message: `Shebang added to ${config.scriptName}.` }
        : { step, status: 'ok', message: `Shebang already exists in ${config.scriptName}.` }
    );

    // Step 6: wrapper command
    step = 'wrapper';
    onProgress({ step, status: 'started', message: `Creating '${config.commandName}' command...` });
    const wrapper = writeWrapper(paths.wrapperPath, renderWrapper(config.interpreter, paths.scriptPath), { dryRun });
    result.wrapper = wrapper;
    onProgress(
      wrapper.alreadyUpToDate
        ? { step, status: 'ok', message: `'${config.commandName}' command is already up to date.` }
        : { step, status: 'changed', message: `'${config.commandName}' command written to ${wrapper.path}.` }
    );

    // Step 7: PATH verification
    step = 'verify';
    if (dryRun) {
      onProgress({ step, status: 'skipped', message: 'Verification skipped in dry run.' });
    } else {
      onProgress({ step, status: 'started', message: `Verifying ${config.commandName} command...` });
      const verification = verifyCommand(config.commandName, config.binDir, env);
      result.verification = verification;
      if (!verification.available) {
        throw new CommandNotFoundError(config.commandName, verificationHint(verification, config.binDir));
      }
      onProgress({ step, status: 'ok', message: `${config.commandName} command is now available globally!` });
    }

    result.success = true;
    result.exitCode = 0;
    return result;
  } catch (error) {
    const failure = toFailure(error);
    logger.debug(`Install failed during ${step}`, failure.message);

    result.error = failure.message;
    result.hint = failure.hint;
    result.exitCode = 1;
    onProgress({ step, status: 'failed', message: failure.message, hint: failure.hint });
    return result;
  }
}

/**
 * Remove the wrapper, the installed script and, when empty, the install
 * directory. System dependencies stay installed.
 */
export function runUninstall(options: UninstallOptions): UninstallResult {
  const { config, dryRun = false } = options;
  const paths = getInstallPaths(config);

  const result: UninstallResult = {
    success: false,
    dryRun,
    wrapperRemoved: false,
    scriptRemoved: false,
    directoryRemoved: false,
    paths
  };

  try {
    result.wrapperRemoved = removeWrapper(paths.wrapperPath, { dryRun });
    result.scriptRemoved = removeScript(paths.scriptPath, { dryRun });
    result.directoryRemoved = removeInstallDirIfEmpty(config.installDir, {
      dryRun,
      ignoring: dryRun && result.scriptRemoved ? [config.scriptName] : []
    });
    result.success = true;
    return result;
  } catch (error) {
    const failure = toFailure(error);
    result.error = failure.message;
    result.hint = failure.hint;
    return result;
  }
}

function fileStatus(path: string): FileStatus {
  const present = isFile(path);
  return {
    path,
    present,
    executable: present && (statSync(path).mode & 0o111) !== 0
  };
}

function scriptHasShebang(scriptPath: string, directive: string): boolean {
  if (!existsSync(scriptPath)) {
    return false;
  }

  try {
    return hasShebang(readFileSync(scriptPath, 'utf-8'), directive);
  } catch (error) {
    logger.warn(`Could not read ${scriptPath}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

/**
 * Inspect the current installation without changing anything
 */
export function checkInstallStatus(config: InstallerConfig, env: NodeJS.ProcessEnv = process.env): InstallStatus {
  const paths = getInstallPaths(config);

  const dependencies = checkDependencies(config.dependencies, env);
  const installDir = { path: config.installDir, present: isInstallDirPresent(config.installDir) };
  const script = {
    ...fileStatus(paths.scriptPath),
    hasShebang: scriptHasShebang(paths.scriptPath, config.shebang)
  };
  const wrapper = {
    ...fileStatus(paths.wrapperPath),
    upToDate: isWrapperUpToDate(paths.wrapperPath, renderWrapper(config.interpreter, paths.scriptPath))
  };
  const command = verifyCommand(config.commandName, config.binDir, env);

  const installed =
    dependencies.every(dependency => dependency.alreadyInstalled) &&
    installDir.present &&
    script.present &&
    script.executable &&
    script.hasShebang &&
    wrapper.present &&
    wrapper.executable &&
    wrapper.upToDate &&
    command.available;

  return { installed, dependencies, installDir, script, wrapper, command };
}
