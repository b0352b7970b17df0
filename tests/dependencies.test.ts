/**
 * Tests for dependency checks and apt-get installation
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { commandPath, runPrivileged } from '../src/shell.js';
import {
  checkDependencies,
  ensureDependencies,
  installPackages,
  isCommandAvailable
} from '../src/dependencies.js';
import { PackageInstallError } from '../src/errors.js';
import type { DependencySpec } from '../src/types.js';

vi.mock('../src/shell.js', () => ({
  commandPath: vi.fn(),
  runPrivileged: vi.fn(),
}));

vi.mock('../src/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const PYTHON: DependencySpec = { command: 'python3', package: 'python3', label: 'Python' };
const GIT: DependencySpec = { command: 'git', package: 'git', label: 'Git' };
const QUIET = { outputToStderr: false };

describe('dependencies', () => {
  let available: Set<string>;

  beforeEach(() => {
    vi.clearAllMocks();
    available = new Set<string>();

    vi.mocked(commandPath).mockImplementation(command =>
      available.has(command) ? `/usr/bin/${command}` : null
    );

    // A successful apt-get install makes the command appear on PATH
    vi.mocked(runPrivileged).mockImplementation((_command, args) => {
      if (args[0] === 'install') {
        available.add(args[2]);
      }
      return 0;
    });
  });

  describe('isCommandAvailable', () => {
    it('should be true when the command resolves', () => {
      available.add('git');
      expect(isCommandAvailable('git')).toBe(true);
    });

    it('should be false when the command does not resolve', () => {
      expect(isCommandAvailable('git')).toBe(false);
    });
  });

  describe('checkDependencies', () => {
    it('should report each dependency without installing', () => {
      available.add('python3');

      const results = checkDependencies([PYTHON, GIT]);

      expect(results).toEqual([
        { ...PYTHON, alreadyInstalled: true, installed: false },
        { ...GIT, alreadyInstalled: false, installed: false },
      ]);
      expect(runPrivileged).not.toHaveBeenCalled();
    });
  });

  describe('installPackages', () => {
    it('should refresh the package index once, then install each package', () => {
      installPackages(['python3', 'git']);

      expect(vi.mocked(runPrivileged).mock.calls).toEqual([
        ['apt-get', ['update'], QUIET],
        ['apt-get', ['install', '-y', 'python3'], QUIET],
        ['apt-get', ['install', '-y', 'git'], QUIET],
      ]);
    });

    it('should route apt-get output to stderr on request', () => {
      installPackages(['git'], { outputToStderr: true });

      expect(vi.mocked(runPrivileged).mock.calls).toEqual([
        ['apt-get', ['update'], { outputToStderr: true }],
        ['apt-get', ['install', '-y', 'git'], { outputToStderr: true }],
      ]);
    });

    it('should do nothing for an empty list', () => {
      installPackages([]);
      expect(runPrivileged).not.toHaveBeenCalled();
    });

    it('should throw when apt-get update fails', () => {
      vi.mocked(runPrivileged).mockReturnValueOnce(100);

      expect(() => installPackages(['git'])).toThrow(PackageInstallError);
      expect(runPrivileged).toHaveBeenCalledTimes(1);
    });

    it('should throw when a package fails to install', () => {
      vi.mocked(runPrivileged).mockReturnValueOnce(0).mockReturnValueOnce(100);

      expect(() => installPackages(['git'])).toThrow('apt-get install git failed with exit code 100');
    });
  });

  describe('ensureDependencies', () => {
    it('should not invoke the package manager when everything is present', () => {
      available.add('python3');
      available.add('git');

      const results = ensureDependencies([PYTHON, GIT]);

      expect(results.map(result => result.alreadyInstalled)).toEqual([true, true]);
      expect(results.map(result => result.installed)).toEqual([false, false]);
      expect(runPrivileged).not.toHaveBeenCalled();
    });

    it('should install only the missing dependency', () => {
      available.add('python3');

      const results = ensureDependencies([PYTHON, GIT]);

      expect(vi.mocked(runPrivileged).mock.calls).toEqual([
        ['apt-get', ['update'], QUIET],
        ['apt-get', ['install', '-y', 'git'], QUIET],
      ]);
      expect(results[0]).toMatchObject({ alreadyInstalled: true, installed: false });
      expect(results[1]).toMatchObject({ alreadyInstalled: false, installed: true });
      expect(results[1].error).toBeUndefined();
    });

    it('should notify about missing dependencies before installing', () => {
      const onMissing = vi.fn();

      ensureDependencies([PYTHON, GIT], { onMissing });

      expect(onMissing).toHaveBeenCalledTimes(1);
      expect(onMissing.mock.calls[0][0].map((result: DependencySpec) => result.command)).toEqual(['python3', 'git']);
      expect(onMissing.mock.invocationCallOrder[0]).toBeLessThan(
        vi.mocked(runPrivileged).mock.invocationCallOrder[0]
      );
    });

    it('should install a shared package only once', () => {
      const pip: DependencySpec = { command: 'pip3', package: 'python3', label: 'pip' };

      ensureDependencies([PYTHON, pip]);

      expect(vi.mocked(runPrivileged).mock.calls).toEqual([
        ['apt-get', ['update'], QUIET],
        ['apt-get', ['install', '-y', 'python3'], QUIET],
      ]);
    });

    it('should pass the output routing to apt-get', () => {
      ensureDependencies([GIT], { outputToStderr: true });

      expect(vi.mocked(runPrivileged).mock.calls.map(call => call[2])).toEqual([
        { outputToStderr: true },
        { outputToStderr: true },
      ]);
    });

    it('should not install anything in dry run mode', () => {
      const onMissing = vi.fn();

      const results = ensureDependencies([PYTHON, GIT], { dryRun: true, onMissing });

      expect(runPrivileged).not.toHaveBeenCalled();
      expect(onMissing).toHaveBeenCalledTimes(1);
      expect(results.every(result => !result.installed)).toBe(true);
    });

    it('should record an error when the command is still missing after install', () => {
      vi.mocked(runPrivileged).mockReturnValue(0);

      const results = ensureDependencies([GIT]);

      expect(results[0].installed).toBe(false);
      expect(results[0].error).toBe('Git is still not available after installing git');
    });

    it('should propagate package manager failures', () => {
      vi.mocked(runPrivileged).mockReturnValue(1);

      expect(() => ensureDependencies([GIT])).toThrow('apt-get update failed with exit code 1');
    });
  });
});
