/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigurationError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const schema = z.object({
  runtime: z.string(),
  retries: z.number().default(3),
});

describe('parseYaml', () => {
  it('should parse valid YAML', () => {
    expect(parseYaml('runtime: python3.11\nretries: 2\n')).toEqual({ runtime: 'python3.11', retries: 2 });
  });

  it('should throw ConfigurationError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(ConfigurationError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('runtime: python3.11\n', schema)).toEqual({ runtime: 'python3.11', retries: 3 });
  });

  it('should validate an empty document as an empty object', () => {
    const result = parseYamlWithSchema('', z.object({ name: z.string().default('x') }));
    expect(result).toEqual({ name: 'x' });
  });

  it('should report the failing path', () => {
    try {
      parseYamlWithSchema('runtime: 311\n', schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: ErrorCodes.INVALID_CONFIG });
      expect(error instanceof ConfigurationError && error.message.startsWith('YAML validation failed: runtime: ')).toBe(true);
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read and validate a file', async () => {
    mockReadFile.mockResolvedValue('runtime: python3.10\n');

    expect(await loadYamlWithSchema('/project/.layersmith.yaml', schema)).toEqual({ runtime: 'python3.10', retries: 3 });
    expect(mockReadFile).toHaveBeenCalledWith('/project/.layersmith.yaml');
  });

  it('should wrap read failures', async () => {
    mockReadFile.mockRejectedValue(new Error('EACCES'));

    await expect(loadYamlWithSchema('/project/.layersmith.yaml', schema)).rejects.toMatchObject({
      message: 'Failed to read YAML file: /project/.layersmith.yaml',
      details: { filePath: '/project/.layersmith.yaml', reason: 'EACCES' },
    });
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('retries: 1\n');

    const error = await loadYamlWithSchema('/project/.layersmith.yaml', schema).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.message.endsWith('(file: /project/.layersmith.yaml)')).toBe(true);
  });
});
