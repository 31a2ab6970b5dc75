/**
 * Tests for the JSON formatter.
 */
import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import type { GenerationResult } from '../../../../src/core/generator/types.js';

const result: GenerationResult = {
  layerArn: 'arn:aws:lambda:us-east-1:123456789012:layer:layer-boto3-requests:3',
  layerName: 'layer-boto3-requests',
  version: 3,
  createdAt: '2024-05-01T12:00:00.000+0000',
  region: 'us-east-1',
  description: 'Python 3.11 layer with: boto3 1.26.1, requests 2.28.0',
  runtime: 'python3.11',
  architecture: 'x86_64',
  packages: ['boto3>=1.26.1', 'requests==2.28.0'],
  archiveBytes: 1536,
};

describe('JsonFormatter', () => {
  const formatter = new JsonFormatter();

  it('should render a generation with snake_case keys', () => {
    expect(JSON.parse(formatter.formatGeneration(result))).toEqual({
      success: true,
      layer_arn: 'arn:aws:lambda:us-east-1:123456789012:layer:layer-boto3-requests:3',
      version: 3,
      layer_name: 'layer-boto3-requests',
      description: 'Python 3.11 layer with: boto3 1.26.1, requests 2.28.0',
      runtime: 'python3.11',
      architecture: 'x86_64',
      region: 'us-east-1',
      packages: ['boto3>=1.26.1', 'requests==2.28.0'],
      created_at: '2024-05-01T12:00:00.000+0000',
      archive_bytes: 1536,
    });
  });

  it('should render a failure payload', () => {
    const output = formatter.formatFailure({ stage: 'parse', kind: 'invalid-spec', message: 'Invalid package name' });

    expect(JSON.parse(output)).toEqual({
      success: false,
      error: { stage: 'parse', kind: 'invalid-spec', message: 'Invalid package name' },
    });
  });

  it('should render layer info', () => {
    const output = formatter.formatLayerInfo({
      arn: result.layerArn,
      version: 3,
      description: '',
      createdAt: '2024-05-01T12:00:00.000+0000',
      compatibleRuntimes: ['python3.11'],
      compatibleArchitectures: ['x86_64'],
      codeSize: 2048,
    });

    expect(JSON.parse(output)).toMatchObject({ layer_arn: result.layerArn, compatible_runtimes: ['python3.11'], code_size: 2048 });
  });
});
