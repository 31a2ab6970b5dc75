/**
 * Package requirement and layer spec type definitions.
 */
import type { Architecture, PythonRuntime } from '../runtimes.js';

/**
 * Version comparison operators, longest first so `<=` wins over `<`.
 */
export const VERSION_OPERATORS = ['==', '>=', '<=', '~=', '!=', '>', '<'] as const;

export type VersionOperator = (typeof VERSION_OPERATORS)[number];

/**
 * A single parsed specifier such as `requests==2.28.0` or `boto3`.
 * `operator` and `version` are either both present or both absent.
 */
export interface PackageRequirement {
  readonly name: string;
  readonly operator?: VersionOperator;
  readonly version?: string;
}

/**
 * Everything the builder needs to produce one layer.
 */
export interface LayerSpec {
  readonly requirements: readonly PackageRequirement[];
  readonly runtime: PythonRuntime;
  readonly architecture: Architecture;
  /** Matches `[A-Za-z0-9_-]+` */
  readonly layerName: string;
  readonly description: string;
}
