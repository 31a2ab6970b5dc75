/**
 * Tests for the layer tree pruning pass.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CLEANUP_POLICY,
  cleanupPatterns,
  pruneLayerTree,
} from '../../../../src/core/builder/prune.js';

async function touch(root: string, relative: string): Promise<void> {
  const full = path.join(root, relative);
  await mkdir(path.dirname(full), { recursive: true });
  await writeFile(full, 'x');
}

describe('cleanupPatterns', () => {
  it('should produce nothing when every category is disabled', () => {
    expect(cleanupPatterns({
      bytecode: false,
      tests: false,
      metadata: false,
      scripts: false,
      extraPatterns: [],
    })).toEqual({ directories: [], files: [] });
  });

  it('should append extra patterns to file patterns', () => {
    const { files } = cleanupPatterns({ ...DEFAULT_CLEANUP_POLICY, bytecode: false, extraPatterns: ['**/*.md'] });
    expect(files).toEqual(['**/*.md']);
  });
});

describe('pruneLayerTree', () => {
  let installDir: string;

  beforeEach(async () => {
    installDir = await mkdtemp(path.join(os.tmpdir(), 'prune-test-'));
    await touch(installDir, 'requests/__init__.py');
    await touch(installDir, 'requests/__pycache__/api.cpython-311.pyc');
    await touch(installDir, 'requests/tests/test_api.py');
    await touch(installDir, 'requests-2.28.0.dist-info/METADATA');
    await touch(installDir, 'six.py');
    await touch(installDir, 'stray.pyc');
    await touch(installDir, 'bin/normalizer');
    await touch(installDir, 'tests/__init__.py');
  });

  afterEach(async () => {
    await rm(installDir, { recursive: true, force: true });
  });

  it('should remove bytecode, metadata, nested tests and scripts', async () => {
    const report = await pruneLayerTree(installDir, DEFAULT_CLEANUP_POLICY);

    expect(report.removedPaths).toEqual([
      'bin',
      'requests-2.28.0.dist-info',
      'requests/__pycache__',
      'requests/tests',
      'stray.pyc',
    ]);
    expect(report.removedDirectories).toBe(4);
    expect(report.removedFiles).toBe(1);
  });

  it('should keep package sources', async () => {
    await pruneLayerTree(installDir, DEFAULT_CLEANUP_POLICY);

    expect(existsSync(path.join(installDir, 'requests/__init__.py'))).toBe(true);
    expect(existsSync(path.join(installDir, 'six.py'))).toBe(true);
  });

  it('should keep a top-level tests package', async () => {
    await pruneLayerTree(installDir, DEFAULT_CLEANUP_POLICY);
    expect(existsSync(path.join(installDir, 'tests/__init__.py'))).toBe(true);
  });

  it('should leave categories that are switched off', async () => {
    const report = await pruneLayerTree(installDir, { ...DEFAULT_CLEANUP_POLICY, metadata: false, scripts: false });

    expect(report.removedPaths).not.toContain('bin');
    expect(existsSync(path.join(installDir, 'requests-2.28.0.dist-info/METADATA'))).toBe(true);
  });
});
