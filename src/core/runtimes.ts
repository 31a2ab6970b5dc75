/**
 * Supported Lambda Python runtimes and their installer targets.
 */
import { InvalidSpecError, ErrorCodes } from '../utils/errors.js';

export const SUPPORTED_RUNTIMES = [
  'python3.8',
  'python3.9',
  'python3.10',
  'python3.11',
  'python3.12',
] as const;

export type PythonRuntime = (typeof SUPPORTED_RUNTIMES)[number];

export const DEFAULT_RUNTIME: PythonRuntime = 'python3.12';

export const SUPPORTED_ARCHITECTURES = ['x86_64', 'arm64'] as const;

export type Architecture = (typeof SUPPORTED_ARCHITECTURES)[number];

export const DEFAULT_ARCHITECTURE: Architecture = 'x86_64';

/**
 * Where and for what the installer resolves wheels.
 */
export interface RuntimeTarget {
  runtime: PythonRuntime;
  /** Interpreter version passed to `--python-version` */
  pythonVersion: string;
  /** Python implementation tag passed to `--implementation` */
  implementation: 'cp';
  /** Wheel platform tags per architecture, each passed as `--platform` */
  platforms: Record<Architecture, readonly string[]>;
  /** Directory under the layer root that Lambda puts on sys.path */
  layerPath: string;
}

// python3.12 runs on Amazon Linux 2023 (glibc 2.34), the rest on Amazon Linux 2 (glibc 2.26)
const AL2_PLATFORMS: Record<Architecture, readonly string[]> = {
  x86_64: ['manylinux2014_x86_64'],
  arm64: ['manylinux2014_aarch64'],
};

const AL2023_PLATFORMS: Record<Architecture, readonly string[]> = {
  x86_64: ['manylinux_2_28_x86_64', 'manylinux2014_x86_64'],
  arm64: ['manylinux_2_28_aarch64', 'manylinux2014_aarch64'],
};

export const RUNTIME_TARGETS: Record<PythonRuntime, RuntimeTarget> = {
  'python3.8': { runtime: 'python3.8', pythonVersion: '3.8', implementation: 'cp', platforms: AL2_PLATFORMS, layerPath: 'python' },
  'python3.9': { runtime: 'python3.9', pythonVersion: '3.9', implementation: 'cp', platforms: AL2_PLATFORMS, layerPath: 'python' },
  'python3.10': { runtime: 'python3.10', pythonVersion: '3.10', implementation: 'cp', platforms: AL2_PLATFORMS, layerPath: 'python' },
  'python3.11': { runtime: 'python3.11', pythonVersion: '3.11', implementation: 'cp', platforms: AL2_PLATFORMS, layerPath: 'python' },
  'python3.12': { runtime: 'python3.12', pythonVersion: '3.12', implementation: 'cp', platforms: AL2023_PLATFORMS, layerPath: 'python' },
};

export function isPythonRuntime(value: string): value is PythonRuntime {
  return (SUPPORTED_RUNTIMES as readonly string[]).includes(value);
}

export function isArchitecture(value: string): value is Architecture {
  return (SUPPORTED_ARCHITECTURES as readonly string[]).includes(value);
}

/**
 * Resolve a runtime selector, falling back to the latest supported runtime.
 */
export function parseRuntime(value: string | undefined): PythonRuntime {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_RUNTIME;
  }
  const normalized = value.trim().toLowerCase();
  if (!isPythonRuntime(normalized)) {
    throw new InvalidSpecError(
      ErrorCodes.UNSUPPORTED_RUNTIME,
      `Unsupported runtime "${value}". Supported: ${SUPPORTED_RUNTIMES.join(', ')}`,
      { runtime: value }
    );
  }
  return normalized;
}

export function getRuntimeTarget(runtime: PythonRuntime): RuntimeTarget {
  return RUNTIME_TARGETS[runtime];
}
