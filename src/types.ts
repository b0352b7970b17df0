/**
 * Core type definitions for gitauto-installer
 */

import type { DependencySpec } from './schemas.js';

export type { DependencySpec, InstallerConfig } from './schemas.js';

export interface DependencyResult extends DependencySpec {
  alreadyInstalled: boolean;
  installed: boolean;
  error?: string;
}

export interface InstallDirResult {
  path: string;
  created: boolean;
}

/** Where the script to install comes from */
export type ScriptSource = 'local' | 'installed' | 'missing';

export interface ScriptCopyResult {
  path: string;
  source: ScriptSource;
  copied: boolean;
  reusedExisting: boolean;
}

export interface ShebangResult {
  path: string;
  added: boolean;
}

export interface WrapperResult {
  path: string;
  written: boolean;
  alreadyUpToDate: boolean;
}

export interface VerificationResult {
  available: boolean;
  resolvedPath: string | null;
  binDirOnPath: boolean;
}

export interface InstallPaths {
  scriptPath: string;
  wrapperPath: string;
}

// ============================================================================
// Progress reporting
// ============================================================================

export type InstallStep =
  | 'dependencies'
  | 'preflight'
  | 'directory'
  | 'script'
  | 'shebang'
  | 'wrapper'
  | 'verify';

export type StepStatus = 'started' | 'ok' | 'changed' | 'skipped' | 'failed';

export interface ProgressEvent {
  step: InstallStep;
  status: StepStatus;
  message: string;
  hint?: string;
}

export type ProgressListener = (event: ProgressEvent) => void;

// ============================================================================
// Command results
// ============================================================================

export type ExitCode = 0 | 1;

export interface InstallResult {
  success: boolean;
  dryRun: boolean;
  exitCode: ExitCode;
  paths: InstallPaths;
  dependencies: DependencyResult[];
  directory?: InstallDirResult;
  script?: ScriptCopyResult;
  shebang?: ShebangResult;
  wrapper?: WrapperResult;
  verification?: VerificationResult;
  error?: string;
  hint?: string;
}

export interface UninstallResult {
  success: boolean;
  dryRun: boolean;
  wrapperRemoved: boolean;
  scriptRemoved: boolean;
  directoryRemoved: boolean;
  paths: InstallPaths;
  error?: string;
  hint?: string;
}

export interface FileStatus {
  path: string;
  present: boolean;
  executable: boolean;
}

export interface InstallStatus {
  installed: boolean;
  dependencies: DependencyResult[];
  installDir: { path: string; present: boolean };
  script: FileStatus & { hasShebang: boolean };
  wrapper: FileStatus & { upToDate: boolean };
  command: VerificationResult;
}
