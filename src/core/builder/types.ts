/**
 * Layer builder type definitions.
 */
import type { Architecture, RuntimeTarget } from '../runtimes.js';
import type { PackageRequirement } from '../spec-parser/types.js';

/**
 * Cancellation and deadline for one blocking operation.
 */
export interface OperationOptions {
  signal?: AbortSignal;
  /** Milliseconds before the operation fails with a timeout-kind error */
  timeoutMs?: number;
}

export interface InstallRequest extends OperationOptions {
  requirements: readonly PackageRequirement[];
  /** Directory packages are installed into (`<layer root>/python`) */
  targetDir: string;
  target: RuntimeTarget;
  architecture: Architecture;
}

export interface InstallReport {
  /** Installer argv, for logging */
  command: string[];
  durationMs: number;
}

/**
 * Installs requirements into a target directory.
 */
export interface PackageInstaller {
  install(request: InstallRequest): Promise<InstallReport>;
}

/**
 * What the pruning pass removes from the staged tree.
 */
export interface CleanupPolicy {
  /** `__pycache__` directories and `*.pyc` / `*.pyo` files */
  bytecode: boolean;
  /** `test` / `tests` directories nested inside packages */
  tests: boolean;
  /** `*.dist-info` / `*.egg-info` directories */
  metadata: boolean;
  /** The top-level `bin/` directory of console scripts */
  scripts: boolean;
  /** Additional glob patterns, relative to the install directory */
  extraPatterns: string[];
}

export interface PruneReport {
  removedDirectories: number;
  removedFiles: number;
  /** Removed paths relative to the install directory, sorted */
  removedPaths: string[];
}

export interface SizeLimits {
  maxZippedBytes: number;
  maxUnzippedBytes: number;
}

/**
 * Result of one build. The staging directory (`rootDir`) is already gone
 * when this is returned; the archive stays until `release()`.
 */
export interface StagingArtifact {
  rootDir: string;
  archivePath: string;
  /** Zipped size */
  sizeBytes: number;
  unzippedBytes: number;
  fileCount: number;
  prune: PruneReport;
  /** Delete the archive and its directory. Safe to call more than once. */
  release(): Promise<void>;
}
