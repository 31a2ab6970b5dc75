/**
 * Scoped temporary directories.
 */
import { makeTempDir, removePath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

export const STAGING_PREFIX = 'layersmith-stage-';

/**
 * Run `work` inside a fresh temp directory and delete it afterwards,
 * whether `work` resolves, throws or is aborted.
 */
export async function withStagingDirectory<T>(
  work: (dir: string) => Promise<T>,
  prefix: string = STAGING_PREFIX
): Promise<T> {
  const dir = await makeTempDir(prefix);
  logger.debug(`Acquired staging directory ${dir}`);
  try {
    return await work(dir);
  } finally {
    await removePath(dir);
    logger.debug(`Released staging directory ${dir}`);
  }
}
