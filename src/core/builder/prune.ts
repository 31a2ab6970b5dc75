/**
 * Size-reduction pass over an installed package tree.
 * Removes what is not needed to import and run the packages; never package sources.
 */
import * as path from 'node:path';
import fg from 'fast-glob';
import { removePath, toPosixPath } from '../../utils/file-system.js';
import type { CleanupPolicy, PruneReport } from './types.js';

export const DEFAULT_CLEANUP_POLICY: CleanupPolicy = {
  bytecode: true,
  tests: true,
  metadata: true,
  scripts: true,
  extraPatterns: [],
};

/**
 * Directory and file globs for a policy, relative to the install directory.
 */
export function cleanupPatterns(policy: CleanupPolicy): { directories: string[]; files: string[] } {
  const directories: string[] = [];
  const files: string[] = [];

  if (policy.bytecode) {
    directories.push('**/__pycache__');
    files.push('**/*.pyc', '**/*.pyo');
  }
  if (policy.metadata) {
    directories.push('**/*.dist-info', '**/*.egg-info');
  }
  if (policy.tests) {
    // Only inside a package: a top-level `tests` may itself be an installed package
    directories.push('*/**/tests', '*/**/test');
  }
  if (policy.scripts) {
    directories.push('bin');
  }
  files.push(...policy.extraPatterns);

  return { directories, files };
}

/**
 * Drop paths nested under another path in the list.
 */
function outermost(paths: string[]): string[] {
  const sorted = [...paths].sort();
  const kept: string[] = [];
  for (const candidate of sorted) {
    if (!kept.some((parent) => candidate.startsWith(`${parent}/`))) {
      kept.push(candidate);
    }
  }
  return kept;
}

export async function pruneLayerTree(installDir: string, policy: CleanupPolicy): Promise<PruneReport> {
  const { directories, files } = cleanupPatterns(policy);

  const dirMatches = directories.length > 0
    ? await fg(directories, { cwd: installDir, onlyDirectories: true, dot: true, followSymbolicLinks: false })
    : [];
  const removedDirs = outermost(dirMatches.map(toPosixPath));
  for (const dir of removedDirs) {
    await removePath(path.join(installDir, dir));
  }

  // Globbed after directory removal so nothing is counted twice
  const fileMatches = files.length > 0
    ? await fg(files, { cwd: installDir, onlyFiles: true, dot: true, followSymbolicLinks: false })
    : [];
  const removedFiles = [...fileMatches].map(toPosixPath).sort();
  for (const file of removedFiles) {
    await removePath(path.join(installDir, file));
  }

  return {
    removedDirectories: removedDirs.length,
    removedFiles: removedFiles.length,
    removedPaths: [...removedDirs, ...removedFiles].sort(),
  };
}
