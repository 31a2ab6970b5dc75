/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  readFile,
  fileExists,
  ensureDir,
  makeTempDir,
  removePath,
  toPosixPath,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'file-system-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file contents as utf-8', async () => {
      const file = path.join(tempDir, 'file.txt');
      await fs.promises.writeFile(file, 'héllo');

      expect(await readFile(file)).toBe('héllo');
    });
  });

  describe('fileExists', () => {
    it('should report existing and missing files', async () => {
      const file = path.join(tempDir, 'present.txt');
      await fs.promises.writeFile(file, '');

      expect(await fileExists(file)).toBe(true);
      expect(await fileExists(path.join(tempDir, 'absent.txt'))).toBe(false);
    });
  });

  describe('ensureDir', () => {
    it('should create nested directories and tolerate existing ones', async () => {
      const nested = path.join(tempDir, 'a', 'b', 'c');

      await ensureDir(nested);
      await ensureDir(nested);

      expect(fs.statSync(nested).isDirectory()).toBe(true);
    });
  });

  describe('makeTempDir / removePath', () => {
    it('should create a prefixed directory and remove it recursively', async () => {
      const dir = await makeTempDir('file-system-test-tmp-');
      fs.writeFileSync(path.join(dir, 'inner.txt'), 'x');

      expect(path.basename(dir).startsWith('file-system-test-tmp-')).toBe(true);
      await removePath(dir);
      expect(fs.existsSync(dir)).toBe(false);
    });

    it('should ignore missing paths', async () => {
      await expect(removePath(path.join(tempDir, 'nothing-here'))).resolves.toBeUndefined();
    });
  });

  describe('toPosixPath', () => {
    it('should join segments with forward slashes', () => {
      expect(toPosixPath(['python', 'requests', 'api.py'].join(path.sep))).toBe('python/requests/api.py');
    });
  });
});
