/**
 * Zip packaging of a staged layer tree.
 */
import { createWriteStream } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import fg from 'fast-glob';
import JSZip from 'jszip';
import { PackagingError, ErrorCodes } from '../../utils/errors.js';

// Fixed entry timestamp so identical trees produce identical archives
const ENTRY_DATE = new Date('1980-01-01T00:00:00Z');

export interface LayerFile {
  /** Path relative to the layer root, forward slashes */
  relativePath: string;
  size: number;
  mode: number;
}

export interface LayerFileListing {
  files: LayerFile[];
  totalBytes: number;
}

export interface ArchiveReport {
  archivePath: string;
  sizeBytes: number;
  fileCount: number;
}

/**
 * List every regular file under the layer root, sorted by path.
 */
export async function collectLayerFiles(layerRoot: string): Promise<LayerFileListing> {
  const entries = await fg('**/*', {
    cwd: layerRoot,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: true,
    stats: true,
  });

  const files: LayerFile[] = [];
  let totalBytes = 0;
  for (const entry of entries) {
    const size = entry.stats?.size ?? 0;
    files.push({ relativePath: entry.path, size, mode: entry.stats?.mode ?? 0o644 });
    totalBytes += size;
  }
  files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  return { files, totalBytes };
}

/**
 * Write the listed files into a DEFLATE zip at `archivePath`, keeping paths
 * relative to the layer root so entries read `python/<package>/...`.
 */
export async function writeLayerArchive(
  layerRoot: string,
  listing: LayerFileListing,
  archivePath: string
): Promise<ArchiveReport> {
  const zip = new JSZip();

  try {
    // Read one file at a time; the unzipped total is already bounded by the size check
    for (const file of listing.files) {
      const content = await readFile(path.join(layerRoot, file.relativePath));
      zip.file(file.relativePath, content, {
        binary: true,
        date: ENTRY_DATE,
        unixPermissions: file.mode,
      });
    }

    await pipeline(
      zip.generateNodeStream({
        type: 'nodebuffer',
        streamFiles: true,
        compression: 'DEFLATE',
        compressionOptions: { level: 9 },
        platform: 'UNIX',
      }),
      createWriteStream(archivePath)
    );
    const { size } = await stat(archivePath);
    return { archivePath, sizeBytes: size, fileCount: listing.files.length };
  } catch (error) {
    throw new PackagingError(
      ErrorCodes.ARCHIVE_FAILED,
      `Failed to write layer archive: ${error instanceof Error ? error.message : String(error)}`,
      'archive',
      { archivePath }
    );
  }
}
