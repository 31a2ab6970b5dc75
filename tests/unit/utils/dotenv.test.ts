/**
 * Tests for dotenv-style file parsing.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseDotenv, loadDotenvFile } from '../../../src/utils/dotenv.js';

describe('parseDotenv', () => {
  it('should parse key/value pairs', () => {
    expect(parseDotenv('AWS_REGION=us-east-1\nAWS_ACCESS_KEY_ID=test-access-key')).toEqual({
      AWS_REGION: 'us-east-1',
      AWS_ACCESS_KEY_ID: 'test-access-key',
    });
  });

  it('should skip comments, blank and malformed lines', () => {
    expect(parseDotenv('# comment\n\nNOT_AN_ASSIGNMENT\nKEY=value\n')).toEqual({ KEY: 'value' });
  });

  it('should strip export prefixes and matching quotes', () => {
    expect(parseDotenv('export A="quoted value"\nB=\'single\'\nC="unbalanced')).toEqual({
      A: 'quoted value',
      B: 'single',
      C: '"unbalanced',
    });
  });

  it('should keep everything after the first equals sign', () => {
    expect(parseDotenv('AWS_SECRET_ACCESS_KEY=test=secret==')).toEqual({ AWS_SECRET_ACCESS_KEY: 'test=secret==' });
  });

  it('should handle CRLF line endings', () => {
    expect(parseDotenv('A=1\r\nB=2\r\n')).toEqual({ A: '1', B: '2' });
  });
});

describe('loadDotenvFile', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('should return an empty object for a missing file', async () => {
    expect(await loadDotenvFile(path.join(os.tmpdir(), 'layersmith-no-such-dir', '.env'))).toEqual({});
  });

  it('should load values from disk', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'dotenv-test-'));
    const file = path.join(dir, '.env');
    await writeFile(file, 'AWS_DEFAULT_REGION=eu-central-1\n');

    expect(await loadDotenvFile(file)).toEqual({ AWS_DEFAULT_REGION: 'eu-central-1' });
  });
});
