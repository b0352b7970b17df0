/**
 * Tests for install directory creation and removal
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ensureInstallDir, isInstallDirPresent, removeInstallDirIfEmpty } from '../src/install-dir.js';
import { InstallerError } from '../src/errors.js';

const TEST_DIR = path.join(os.tmpdir(), 'gitauto-installer-dir-test-' + process.pid);
const INSTALL_DIR = path.join(TEST_DIR, 'opt', 'gitAuto');

describe('install-dir', () => {
  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  describe('isInstallDirPresent', () => {
    it('should be false for a missing path', () => {
      expect(isInstallDirPresent(INSTALL_DIR)).toBe(false);
    });

    it('should be false for a regular file', () => {
      const file = path.join(TEST_DIR, 'file');
      fs.writeFileSync(file, '');
      expect(isInstallDirPresent(file)).toBe(false);
    });

    it('should be true for a directory', () => {
      fs.mkdirSync(INSTALL_DIR, { recursive: true });
      expect(isInstallDirPresent(INSTALL_DIR)).toBe(true);
    });
  });

  describe('ensureInstallDir', () => {
    it('should create missing parent directories', () => {
      const result = ensureInstallDir(INSTALL_DIR);

      expect(result).toEqual({ path: INSTALL_DIR, created: true });
      expect(fs.statSync(INSTALL_DIR).isDirectory()).toBe(true);
    });

    it('should succeed without changes when the directory exists', () => {
      fs.mkdirSync(INSTALL_DIR, { recursive: true });
      fs.writeFileSync(path.join(INSTALL_DIR, 'keep.txt'), 'keep');

      const result = ensureInstallDir(INSTALL_DIR);

      expect(result).toEqual({ path: INSTALL_DIR, created: false });
      expect(fs.readFileSync(path.join(INSTALL_DIR, 'keep.txt'), 'utf-8')).toBe('keep');
    });

    it('should be safe to repeat', () => {
      ensureInstallDir(INSTALL_DIR);
      const second = ensureInstallDir(INSTALL_DIR);

      expect(second.created).toBe(false);
    });

    it('should not create anything in dry run mode', () => {
      const result = ensureInstallDir(INSTALL_DIR, { dryRun: true });

      expect(result.created).toBe(true);
      expect(fs.existsSync(INSTALL_DIR)).toBe(false);
    });

    it('should fail when the path is a file', () => {
      fs.mkdirSync(path.dirname(INSTALL_DIR), { recursive: true });
      fs.writeFileSync(INSTALL_DIR, 'not a directory');

      expect(() => ensureInstallDir(INSTALL_DIR)).toThrow(InstallerError);
      expect(() => ensureInstallDir(INSTALL_DIR)).toThrow(`${INSTALL_DIR} exists but is not a directory`);
    });
  });

  describe('removeInstallDirIfEmpty', () => {
    it('should remove an empty directory', () => {
      fs.mkdirSync(INSTALL_DIR, { recursive: true });

      expect(removeInstallDirIfEmpty(INSTALL_DIR)).toBe(true);
      expect(fs.existsSync(INSTALL_DIR)).toBe(false);
    });

    it('should keep a directory that still has files', () => {
      fs.mkdirSync(INSTALL_DIR, { recursive: true });
      fs.writeFileSync(path.join(INSTALL_DIR, 'notes.txt'), 'mine');

      expect(removeInstallDirIfEmpty(INSTALL_DIR)).toBe(false);
      expect(fs.existsSync(INSTALL_DIR)).toBe(true);
    });

    it('should return false when the directory does not exist', () => {
      expect(removeInstallDirIfEmpty(INSTALL_DIR)).toBe(false);
    });

    it('should treat ignored entries as removed in dry run mode', () => {
      fs.mkdirSync(INSTALL_DIR, { recursive: true });
      fs.writeFileSync(path.join(INSTALL_DIR, 'gitauto.py'), 'print("hi")\n');

      expect(removeInstallDirIfEmpty(INSTALL_DIR, { dryRun: true, ignoring: ['gitauto.py'] })).toBe(true);
      expect(fs.existsSync(path.join(INSTALL_DIR, 'gitauto.py'))).toBe(true);
    });
  });
});
