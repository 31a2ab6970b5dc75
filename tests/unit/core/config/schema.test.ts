/**
 * Tests for the config schema.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, InstallSettingsSchema } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should treat null sections as missing', () => {
    const config = ConfigSchema.parse({ install: null, limits: null });

    expect(config.install.command).toBe('pip');
    expect(config.limits.max_zipped_bytes).toBe(50 * 1024 * 1024);
  });

  it('should reject unsupported architectures', () => {
    expect(ConfigSchema.safeParse({ architecture: 'aarch64' }).success).toBe(false);
  });

  it('should keep explicit limits', () => {
    const config = ConfigSchema.parse({ limits: { max_unzipped_bytes: 1000 } });
    expect(config.limits).toEqual({ max_zipped_bytes: 52428800, max_unzipped_bytes: 1000 });
  });
});

describe('InstallSettingsSchema', () => {
  it('should require a valid index URL', () => {
    expect(InstallSettingsSchema.safeParse({ index_url: 'not a url' }).success).toBe(false);
    expect(InstallSettingsSchema.parse({ index_url: 'https://pypi.example.test/simple' }).index_url)
      .toBe('https://pypi.example.test/simple');
  });

  it('should reject a non-positive timeout', () => {
    expect(InstallSettingsSchema.safeParse({ timeout_seconds: 0 }).success).toBe(false);
  });
});
