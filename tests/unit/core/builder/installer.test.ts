/**
 * Tests for the pip installer.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  PipInstaller,
  findOffendingPackage,
  type CommandRunner,
} from '../../../../src/core/builder/installer.js';
import type { InstallRequest } from '../../../../src/core/builder/types.js';
import { getRuntimeTarget } from '../../../../src/core/runtimes.js';
import { parseRequirements } from '../../../../src/core/spec-parser/parser.js';
import { InstallError, ErrorCodes } from '../../../../src/utils/errors.js';

function request(overrides: Partial<InstallRequest> = {}): InstallRequest {
  return {
    requirements: parseRequirements('requests==2.28.0,boto3'),
    targetDir: '/tmp/stage/layer/python',
    target: getRuntimeTarget('python3.11'),
    architecture: 'x86_64',
    ...overrides,
  };
}

function failWith(props: Record<string, unknown>): CommandRunner {
  return async () => {
    throw Object.assign(new Error(String(props.message ?? 'Command failed')), props);
  };
}

describe('PipInstaller', () => {
  describe('buildArgs', () => {
    it('should target the runtime interpreter and platform', () => {
      const args = new PipInstaller().buildArgs(request());

      expect(args).toEqual([
        'install',
        '--target', '/tmp/stage/layer/python',
        '--no-cache-dir',
        '--disable-pip-version-check',
        '--upgrade',
        '--platform', 'manylinux2014_x86_64',
        '--implementation', 'cp',
        '--python-version', '3.11',
        '--only-binary=:all:',
        '--',
        'requests==2.28.0',
        'boto3',
      ]);
    });

    it('should pass one --platform flag per tag', () => {
      const args = new PipInstaller().buildArgs(request({
        target: getRuntimeTarget('python3.12'),
        architecture: 'arm64',
      }));

      const platforms = args.flatMap((arg, i) => (arg === '--platform' ? [args[i + 1]] : []));
      expect(platforms).toEqual(['manylinux_2_28_aarch64', 'manylinux2014_aarch64']);
    });

    it('should keep leading words of a multi-word command', () => {
      const args = new PipInstaller({ command: 'python3 -m pip' }).buildArgs(request());
      expect(args.slice(0, 3)).toEqual(['-m', 'pip', 'install']);
    });

    it('should pass the index URL before the requirements', () => {
      const args = new PipInstaller({ indexUrl: 'https://pypi.example.test/simple' })
        .buildArgs(request());

      expect(args.slice(-6)).toEqual([
        '--only-binary=:all:',
        '--index-url', 'https://pypi.example.test/simple',
        '--',
        'requests==2.28.0',
        'boto3',
      ]);
    });

    it('should always request wheels alongside the platform flags', () => {
      const args = new PipInstaller({ command: 'python3 -m pip' }).buildArgs(request());

      expect(args).toContain('--platform');
      expect(args).toContain('--only-binary=:all:');
    });

    it('should end options before the requirements', () => {
      const args = new PipInstaller().buildArgs(request({ requirements: parseRequirements('requests') }));
      expect(args.slice(-2)).toEqual(['--', 'requests']);
    });
  });

  describe('install', () => {
    it('should run the command with timeout and signal', async () => {
      const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });
      const controller = new AbortController();

      const report = await new PipInstaller({ command: 'pip3', runner })
        .install(request({ signal: controller.signal, timeoutMs: 5000 }));

      expect(runner).toHaveBeenCalledTimes(1);
      const [file, , options] = runner.mock.calls[0];
      expect(file).toBe('pip3');
      expect(options.signal).toBe(controller.signal);
      expect(options.timeout).toBe(5000);
      expect(report.command[0]).toBe('pip3');
    });

    it('should name the offending package on failure', async () => {
      const installer = new PipInstaller({
        runner: failWith({
          code: 1,
          stderr: 'ERROR: Could not find a version that satisfies the requirement requests==2.28.0\n' +
            'ERROR: No matching distribution found for requests==2.28.0',
        }),
      });

      const error = await installer.install(request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InstallError);
      if (!(error instanceof InstallError)) return;
      expect(error.code).toBe(ErrorCodes.INSTALL_FAILED);
      expect(error.kind).toBe('install');
      expect(error.message.startsWith('Failed to install requests: ')).toBe(true);
      expect(error.details).toEqual({ package: 'requests', exitCode: 1 });
    });

    it('should report a missing installer', async () => {
      const installer = new PipInstaller({ runner: failWith({ code: 'ENOENT' }) });

      await expect(installer.install(request())).rejects.toMatchObject({
        code: ErrorCodes.INSTALLER_NOT_FOUND,
        kind: 'install',
      });
    });

    it('should report a killed process as a timeout', async () => {
      const installer = new PipInstaller({ runner: failWith({ killed: true, signal: 'SIGTERM' }) });

      await expect(installer.install(request({ timeoutMs: 100 }))).rejects.toMatchObject({
        code: ErrorCodes.INSTALL_TIMEOUT,
        kind: 'timeout',
      });
    });

    it('should report cancellation when the signal is aborted', async () => {
      const controller = new AbortController();
      const runner: CommandRunner = async () => {
        controller.abort();
        throw Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });
      };

      await expect(
        new PipInstaller({ runner }).install(request({ signal: controller.signal }))
      ).rejects.toMatchObject({ code: ErrorCodes.BUILD_CANCELLED, kind: 'cancelled' });
    });
  });
});

describe('findOffendingPackage', () => {
  const requirements = parseRequirements('Typing_Extensions>=4,requests');

  it('should map the reported name back to the requested one', () => {
    expect(findOffendingPackage('No matching distribution found for typing-extensions>=4', requirements))
      .toBe('Typing_Extensions');
  });

  it('should return the reported name for unknown packages', () => {
    expect(findOffendingPackage('Cannot install urllib3 because these package versions conflict', requirements))
      .toBe('urllib3');
  });

  it('should return undefined when nothing matches', () => {
    expect(findOffendingPackage('Some unrelated failure', requirements)).toBeUndefined();
  });
});
