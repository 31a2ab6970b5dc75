/**
 * File system helpers shared by the builder and config loaders.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Create a fresh directory under the OS temp dir.
 */
export async function makeTempDir(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a file or directory tree. Missing paths are not an error.
 */
export async function removePath(target: string): Promise<void> {
  await fs.promises.rm(target, { recursive: true, force: true });
}

/**
 * Convert a relative path to forward-slash form for archive entries.
 */
export function toPosixPath(relative: string): string {
  return relative.split(path.sep).join('/');
}
