/**
 * Layer naming and description derived from parsed requirements.
 */
import { getRuntimeTarget, type PythonRuntime } from '../runtimes.js';
import type { PackageRequirement } from './types.js';

const MAX_NAMES_IN_LABEL = 3;

/** Lambda's limit on layer version descriptions */
export const MAX_DESCRIPTION_LENGTH = 256;

/**
 * Derive the layer name: lowercase names, sorted, first three, joined with `-`,
 * prefixed with `layer-` and stripped to `[A-Za-z0-9_-]`.
 * Names beyond the third are dropped from the label only.
 */
export function deriveLayerName(requirements: readonly PackageRequirement[]): string {
  const names = [...new Set(requirements.map((r) => r.name.toLowerCase()))].sort();
  const label = `layer-${names.slice(0, MAX_NAMES_IN_LABEL).join('-')}`;
  return label.replace(/[^A-Za-z0-9_-]/g, '');
}

/**
 * Human-readable layer description, e.g. `Python 3.11 layer with: requests 2.28.0, boto3`.
 */
export function describeLayer(
  requirements: readonly PackageRequirement[],
  runtime: PythonRuntime
): string {
  const packages = requirements
    .map((r) => (r.version ? `${r.name} ${r.version}` : r.name))
    .join(', ');
  const { pythonVersion } = getRuntimeTarget(runtime);
  const description = `Python ${pythonVersion} layer with: ${packages}`;
  return description.length <= MAX_DESCRIPTION_LENGTH
    ? description
    : `${description.slice(0, MAX_DESCRIPTION_LENGTH - 3)}...`;
}
