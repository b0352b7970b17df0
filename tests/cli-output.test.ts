/**
 * Tests for console rendering of progress and status
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  BANNER_RULE,
  createConsoleReporter,
  formatBanner,
  formatDependencyLine,
  formatProgressEvent,
  formatStatus
} from '../src/cli-output.js';
import type { InstallStatus } from '../src/types.js';

const STATUS: InstallStatus = {
  installed: false,
  dependencies: [
    { command: 'python3', package: 'python3', label: 'Python', alreadyInstalled: true, installed: false },
    { command: 'git', package: 'git', label: 'Git', alreadyInstalled: false, installed: false }
  ],
  installDir: { path: '/opt/gitAuto', present: true },
  script: { path: '/opt/gitAuto/gitauto.py', present: true, executable: true, hasShebang: true },
  wrapper: { path: '/usr/local/bin/gitauto', present: false, executable: false, upToDate: false },
  command: { available: false, resolvedPath: null, binDirOnPath: true }
};

describe('cli-output', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should frame the banner title', () => {
    expect(formatBanner('Setting up')).toEqual([BANNER_RULE, 'Setting up', BANNER_RULE]);
    expect(BANNER_RULE).toHaveLength(42);
  });

  describe('formatProgressEvent', () => {
    it('should mark completed steps', () => {
      expect(formatProgressEvent({ step: 'directory', status: 'ok', message: 'Directory already exists: /opt/gitAuto' })).toEqual([
        '✓ Directory already exists: /opt/gitAuto'
      ]);
      expect(formatProgressEvent({ step: 'shebang', status: 'changed', message: 'Shebang added to gitauto.py.' })).toEqual([
        '✓ Shebang added to gitauto.py.'
      ]);
    });

    it('should mark skipped steps', () => {
      expect(formatProgressEvent({ step: 'verify', status: 'skipped', message: 'Verification skipped in dry run.' })).toEqual([
        '- Verification skipped in dry run.'
      ]);
    });

    it('should print the hint under a failure', () => {
      expect(
        formatProgressEvent({
          step: 'verify',
          status: 'failed',
          message: 'Command not found. Please restart your terminal and try again.',
          hint: '/usr/local/bin is not on your PATH. Add it to PATH in your shell profile.'
        })
      ).toEqual([
        '✗ Command not found. Please restart your terminal and try again.',
        '  /usr/local/bin is not on your PATH. Add it to PATH in your shell profile.'
      ]);
    });

    it('should print a failure without a hint on one line', () => {
      expect(formatProgressEvent({ step: 'preflight', status: 'failed', message: 'gitauto.py not found!' })).toEqual([
        '✗ gitauto.py not found!'
      ]);
    });
  });

  describe('createConsoleReporter', () => {
    it('should separate steps with a blank line', () => {
      const lines: string[] = [];
      const report = createConsoleReporter(line => lines.push(line));

      report({ step: 'directory', status: 'started', message: 'Creating install directory...' });
      report({ step: 'directory', status: 'changed', message: 'Directory created: /opt/gitAuto' });
      report({ step: 'script', status: 'started', message: 'Copying gitauto.py to /opt/gitAuto...' });

      expect(lines).toEqual([
        'Creating install directory...',
        '✓ Directory created: /opt/gitAuto',
        '',
        'Copying gitauto.py to /opt/gitAuto...'
      ]);
    });
  });

  it('should describe a dependency', () => {
    expect(formatDependencyLine(STATUS.dependencies[0])).toBe('  ✓ Python (python3): installed');
    expect(formatDependencyLine(STATUS.dependencies[1])).toBe('  ✗ Git (git): not installed');
  });

  it('should render the status report', () => {
    expect(formatStatus(STATUS)).toEqual([
      'Installation Status',
      '',
      '  Dependencies:',
      '    ✓ Python (python3): installed',
      '    ✗ Git (git): not installed',
      '',
      '  Files:',
      '    ✓ Install directory: /opt/gitAuto',
      '    ✓ Script: /opt/gitAuto/gitauto.py',
      '    ✓ Interpreter directive',
      '    ✗ Wrapper: /usr/local/bin/gitauto',
      '',
      '  Command:',
      '    ✗ Not found on PATH',
      '',
      'Not fully installed'
    ]);
  });
});
