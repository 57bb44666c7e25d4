import { describe, it, expect, vi } from 'vitest';
import { withRetry, generateRecordId, preview, nowIso } from '../utils.js';

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { baseDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry until success', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop when shouldRetry rejects the error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('invalid request'));

    await expect(
      withRetry(fn, { maxRetries: 3, baseDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow('invalid request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow after exhausting retries', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('rate_limit'));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow('rate_limit');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('generateRecordId', () => {
  it('should build lowercase prefixed ids', () => {
    expect(generateRecordId('rx')).toMatch(/^rx-[0-9a-f]{8}$/);
  });

  it('should honour length and uppercase', () => {
    expect(generateRecordId('URG', 6, { uppercase: true })).toMatch(/^URG-[0-9A-F]{6}$/);
  });
});

describe('preview', () => {
  it('should truncate long text only', () => {
    expect(preview('abcdef', 3)).toBe('abc');
    expect(preview('ab', 3)).toBe('ab');
  });
});

describe('nowIso', () => {
  it('should return an ISO timestamp', () => {
    expect(nowIso()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});
