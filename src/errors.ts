/**
 * Error types raised by the installation steps.
 *
 * Every InstallerError is fatal: the installer stops and the CLI exits
 * with status 1. Conditions that are already satisfied (dependency
 * present, directory exists, shebang present) are never errors.
 */

export interface InstallerErrorOptions {
  /** Suggested next action for the operator */
  hint?: string;
  cause?: unknown;
}

export class InstallerError extends Error {
  readonly hint?: string;

  constructor(message: string, options: InstallerErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'InstallerError';
    this.hint = options.hint;
  }
}

/**
 * The tool script is neither in the working directory nor already installed
 */
export class MissingScriptError extends InstallerError {
  constructor(public readonly scriptName: string) {
    super(`${scriptName} not found! Please place it in the current directory.`);
    this.name = 'MissingScriptError';
  }
}

export class PackageInstallError extends InstallerError {
  constructor(message: string, public readonly packages: string[]) {
    super(message, { hint: 'Check the package manager output above and re-run the installer.' });
    this.name = 'PackageInstallError';
  }
}

export class CommandNotFoundError extends InstallerError {
  constructor(public readonly commandName: string, hint?: string) {
    super('Command not found. Please restart your terminal and try again.', { hint });
    this.name = 'CommandNotFoundError';
  }
}

export class ConfigError extends InstallerError {
  constructor(message: string, public readonly configPath: string) {
    super(message, { hint: `Fix or remove ${configPath}` });
    this.name = 'ConfigError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Convert a filesystem failure into an InstallerError, pointing at sudo
 * when the failure is a permission problem.
 */
export function toInstallerError(error: unknown, action: string, path: string): InstallerError {
  if (error instanceof InstallerError) {
    return error;
  }

  if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
    return new InstallerError(`Permission denied while ${action} ${path}`, {
      hint: 'Re-run the installer with sudo.',
      cause: error
    });
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new InstallerError(`Failed while ${action} ${path}: ${reason}`, { cause: error });
}
