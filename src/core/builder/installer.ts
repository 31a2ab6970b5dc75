/**
 * pip-based package installer.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { InstallError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatRequirement, normalizePackageName } from '../spec-parser/parser.js';
import type { PackageRequirement } from '../spec-parser/types.js';
import type { InstallReport, InstallRequest, PackageInstaller } from './types.js';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;
const STDERR_EXCERPT_LENGTH = 2000;

export interface CommandRunOptions {
  signal?: AbortSignal;
  timeout?: number;
  maxBuffer: number;
}

/**
 * Runs a command to completion and resolves with its output.
 * Rejects with the child_process error shape on non-zero exit.
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: CommandRunOptions
) => Promise<{ stdout: string; stderr: string }>;

const runCommand: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, { ...options, encoding: 'utf-8' });
  return { stdout, stderr };
};

export interface PipInstallerOptions {
  /** Installer command, may include leading args, e.g. `python3 -m pip` */
  command?: string;
  indexUrl?: string | null;
  runner?: CommandRunner;
}

const OFFENDER_PATTERNS = [
  /No matching distribution found for ([^\s;]+)/,
  /Could not find a version that satisfies the requirement ([^\s;]+)/,
  /Cannot install ([^\s;]+?)(?: and| because|,)/,
  /ERROR: Invalid requirement: '?([^\s']+)'?/,
];

/**
 * Pick the requirement pip complained about out of its stderr.
 */
export function findOffendingPackage(
  stderr: string,
  requirements: readonly PackageRequirement[]
): string | undefined {
  for (const pattern of OFFENDER_PATTERNS) {
    const match = stderr.match(pattern);
    if (!match) continue;
    const reported = match[1];
    const reportedName = normalizePackageName(reported.split(/[=<>~!\[]/)[0]);
    const known = requirements.find((r) => normalizePackageName(r.name) === reportedName);
    return known ? known.name : reported;
  }
  return undefined;
}

/**
 * Installs requirements with `pip install --target`, resolving wheels for
 * the Lambda runtime's interpreter and platform instead of the host's.
 */
export class PipInstaller implements PackageInstaller {
  private readonly command: string[];
  private readonly indexUrl: string | null;
  private readonly runner: CommandRunner;

  constructor(options: PipInstallerOptions = {}) {
    this.command = (options.command ?? 'pip').trim().split(/\s+/);
    this.indexUrl = options.indexUrl ?? null;
    this.runner = options.runner ?? runCommand;
  }

  buildArgs(request: InstallRequest): string[] {
    const args = [
      ...this.command.slice(1),
      'install',
      '--target', request.targetDir,
      '--no-cache-dir',
      '--disable-pip-version-check',
      '--upgrade',
    ];

    for (const platform of request.target.platforms[request.architecture]) {
      args.push('--platform', platform);
    }
    args.push(
      '--implementation', request.target.implementation,
      '--python-version', request.target.pythonVersion,
      // pip rejects the three flags above unless only wheels are accepted
      '--only-binary=:all:',
    );
    if (this.indexUrl) {
      args.push('--index-url', this.indexUrl);
    }

    args.push('--', ...request.requirements.map(formatRequirement));
    return args;
  }

  async install(request: InstallRequest): Promise<InstallReport> {
    const [file] = this.command;
    const args = this.buildArgs(request);
    const started = Date.now();

    logger.debug(`Running ${file} ${args.join(' ')}`);

    try {
      const { stderr } = await this.runner(file, args, {
        signal: request.signal,
        timeout: request.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      if (stderr.trim()) {
        logger.debug('Installer stderr', { stderr: stderr.slice(-STDERR_EXCERPT_LENGTH) });
      }
    } catch (error) {
      throw toInstallError(error, request, file);
    }

    return { command: [file, ...args], durationMs: Date.now() - started };
  }
}

function toInstallError(error: unknown, request: InstallRequest, file: string): InstallError {
  if (request.signal?.aborted || (error instanceof Error && error.name === 'AbortError')) {
    return new InstallError(ErrorCodes.BUILD_CANCELLED, 'Package installation was cancelled', 'cancelled');
  }

  if (!(error instanceof Error)) {
    return new InstallError(ErrorCodes.INSTALL_FAILED, `Package installation failed: ${String(error)}`);
  }

  if ('code' in error && error.code === 'ENOENT') {
    return new InstallError(
      ErrorCodes.INSTALLER_NOT_FOUND,
      `Installer command "${file}" was not found. Is pip installed and on PATH?`,
      'install',
      { command: file }
    );
  }

  if ('killed' in error && error.killed === true && request.timeoutMs !== undefined) {
    return new InstallError(
      ErrorCodes.INSTALL_TIMEOUT,
      `Package installation timed out after ${request.timeoutMs} ms`,
      'timeout',
      { timeoutMs: request.timeoutMs }
    );
  }

  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  const offender = findOffendingPackage(stderr, request.requirements);
  const summary = offender ? `Failed to install ${offender}` : 'Package installation failed';
  const excerpt = stderr.trim().slice(-STDERR_EXCERPT_LENGTH);

  return new InstallError(
    ErrorCodes.INSTALL_FAILED,
    excerpt ? `${summary}: ${excerpt}` : `${summary}: ${error.message}`,
    'install',
    { package: offender, exitCode: 'code' in error ? error.code : undefined }
  );
}
