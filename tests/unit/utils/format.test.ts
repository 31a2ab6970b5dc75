/**
 * Tests for format utility functions.
 */
import { describe, it, expect } from 'vitest';
import { formatBytes, formatDuration } from '../../../src/utils/format.js';

describe('formatBytes', () => {
  it('should print small values in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('should use binary units with two decimals', () => {
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(50 * 1024 * 1024)).toBe('50.00 MB');
    expect(formatBytes(3 * 1024 ** 3)).toBe('3.00 GB');
  });

  it('should stop at GB', () => {
    expect(formatBytes(2048 * 1024 ** 3)).toBe('2048.00 GB');
  });
});

describe('formatDuration', () => {
  it('should print seconds with one decimal', () => {
    expect(formatDuration(0)).toBe('0.0s');
    expect(formatDuration(12_345)).toBe('12.3s');
  });
});
