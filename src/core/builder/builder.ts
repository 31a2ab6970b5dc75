/**
 * Layer builder: install, prune and zip one layer inside a scoped staging directory.
 */
import * as path from 'node:path';
import { InstallError, PackagingError, ErrorCodes } from '../../utils/errors.js';
import { ensureDir, makeTempDir, removePath } from '../../utils/file-system.js';
import { formatBytes, formatDuration } from '../../utils/format.js';
import { logger } from '../../utils/logger.js';
import { getRuntimeTarget } from '../runtimes.js';
import type { LayerSpec } from '../spec-parser/types.js';
import { collectLayerFiles, writeLayerArchive } from './archive.js';
import { DEFAULT_CLEANUP_POLICY, pruneLayerTree } from './prune.js';
import { withStagingDirectory, STAGING_PREFIX } from './staging.js';
import type {
  CleanupPolicy,
  OperationOptions,
  PackageInstaller,
  SizeLimits,
  StagingArtifact,
} from './types.js';

/** Lambda quotas: 50 MB zipped for direct upload, 250 MB unzipped */
export const DEFAULT_SIZE_LIMITS: SizeLimits = {
  maxZippedBytes: 50 * 1024 * 1024,
  maxUnzippedBytes: 250 * 1024 * 1024,
};

const OUTPUT_PREFIX = 'layersmith-out-';
const ARCHIVE_NAME = 'layer.zip';

export interface LayerBuilderOptions {
  installer: PackageInstaller;
  cleanup?: CleanupPolicy;
  limits?: SizeLimits;
  /** Temp directory prefix for the staging tree */
  stagingPrefix?: string;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PackagingError(ErrorCodes.BUILD_CANCELLED, 'Layer build was cancelled', 'cancelled');
  }
}

export class LayerBuilder {
  private readonly installer: PackageInstaller;
  private readonly cleanup: CleanupPolicy;
  private readonly limits: SizeLimits;
  private readonly stagingPrefix: string;

  constructor(options: LayerBuilderOptions) {
    this.installer = options.installer;
    this.cleanup = options.cleanup ?? DEFAULT_CLEANUP_POLICY;
    this.limits = options.limits ?? DEFAULT_SIZE_LIMITS;
    this.stagingPrefix = options.stagingPrefix ?? STAGING_PREFIX;
  }

  /**
   * Build the layer archive for `spec`.
   * The staging directory is gone when this settles; the caller owns the
   * returned archive and must call `release()` on it.
   */
  async build(spec: LayerSpec, options: OperationOptions = {}): Promise<StagingArtifact> {
    const target = getRuntimeTarget(spec.runtime);
    const outputDir = await makeTempDir(OUTPUT_PREFIX);
    const archivePath = path.join(outputDir, ARCHIVE_NAME);
    let released = false;
    const release = async (): Promise<void> => {
      if (released) return;
      released = true;
      await removePath(outputDir);
    };

    try {
      let rootDir = '';
      const built = await withStagingDirectory(async (stagingDir) => {
        rootDir = stagingDir;
        const layerRoot = path.join(stagingDir, 'layer');
        const installDir = path.join(layerRoot, target.layerPath);
        await ensureDir(installDir);

        logger.detail('Runtime', `${spec.runtime} (${spec.architecture})`);
        logger.detail('Install directory', installDir);

        const report = await this.installer.install({
          requirements: spec.requirements,
          targetDir: installDir,
          target,
          architecture: spec.architecture,
          signal: options.signal,
          timeoutMs: options.timeoutMs,
        });
        logger.success(`Installed ${spec.requirements.length} package(s) in ${formatDuration(report.durationMs)}`);

        throwIfCancelled(options.signal);
        const prune = await pruneLayerTree(installDir, this.cleanup);
        logger.detail('Cleanup', `removed ${prune.removedDirectories} directories and ${prune.removedFiles} files`);

        throwIfCancelled(options.signal);
        const listing = await collectLayerFiles(layerRoot);
        if (listing.files.length === 0) {
          throw new InstallError(
            ErrorCodes.INSTALL_FAILED,
            'Installer finished but produced no files in the layer directory'
          );
        }
        if (listing.totalBytes > this.limits.maxUnzippedBytes) {
          throw sizeLimitError('unzipped', listing.totalBytes, this.limits.maxUnzippedBytes);
        }

        const archive = await writeLayerArchive(layerRoot, listing, archivePath);
        return { archive, prune, unzippedBytes: listing.totalBytes };
      }, this.stagingPrefix);

      if (built.archive.sizeBytes > this.limits.maxZippedBytes) {
        throw sizeLimitError('zipped', built.archive.sizeBytes, this.limits.maxZippedBytes);
      }

      logger.success(
        `Layer archive ready: ${formatBytes(built.archive.sizeBytes)} zipped, ` +
        `${formatBytes(built.unzippedBytes)} unzipped, ${built.archive.fileCount} files`
      );

      return {
        rootDir,
        archivePath,
        sizeBytes: built.archive.sizeBytes,
        unzippedBytes: built.unzippedBytes,
        fileCount: built.archive.fileCount,
        prune: built.prune,
        release,
      };
    } catch (error) {
      await release();
      throw error;
    }
  }
}

function sizeLimitError(measure: 'zipped' | 'unzipped', actual: number, limit: number): PackagingError {
  return new PackagingError(
    ErrorCodes.SIZE_LIMIT,
    `Layer is ${formatBytes(actual)} ${measure}, over the ${formatBytes(limit)} limit`,
    'size-limit',
    { measure, actual, limit }
  );
}
