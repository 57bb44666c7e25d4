import { describe, it, expect, vi } from 'vitest';
import { validateEnv, getMissingSecrets, hasSecret, logSecretsStatus } from '../env.js';

describe('validateEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const env = validateEnv({});

    expect(env).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      SERVICE_NAME: 'medisync',
      DATA_DIR: './data',
      OPENAI_MODEL: 'gpt-4o',
      RISK_AI_ENRICHMENT: true,
      WELLNESS_AI_REPLIES: true,
    });
  });

  it('should parse boolean flags', () => {
    const env = validateEnv({ RISK_AI_ENRICHMENT: 'false', WELLNESS_AI_REPLIES: 'true' });

    expect(env.RISK_AI_ENRICHMENT).toBe(false);
    expect(env.WELLNESS_AI_REPLIES).toBe(true);
  });

  it('should keep the configured key and data directory', () => {
    const env = validateEnv({ OPENAI_API_KEY: 'test-secret', DATA_DIR: '/tmp/records' });

    expect(env.OPENAI_API_KEY).toBe('test-secret');
    expect(env.DATA_DIR).toBe('/tmp/records');
  });

  it('should throw listing invalid fields', () => {
    expect(() => validateEnv({ NODE_ENV: 'staging', LOG_LEVEL: 'verbose' })).toThrow(
      /Environment validation failed:\n {2}NODE_ENV: .*\n {2}LOG_LEVEL: /
    );
  });
});

describe('secrets helpers', () => {
  it('should treat empty values as missing', () => {
    expect(hasSecret('OPENAI_API_KEY', { OPENAI_API_KEY: '' })).toBe(false);
    expect(hasSecret('OPENAI_API_KEY', { OPENAI_API_KEY: 'test-secret' })).toBe(true);
  });

  it('should list missing optional secrets', () => {
    expect(getMissingSecrets({})).toEqual(['OPENAI_API_KEY']);
    expect(getMissingSecrets({ OPENAI_API_KEY: 'test-secret' })).toEqual([]);
  });

  it('should log status without values', () => {
    const info = vi.fn();
    logSecretsStatus({ info }, { OPENAI_API_KEY: 'test-secret' });

    expect(info).toHaveBeenCalledWith({ OPENAI_API_KEY: 'configured' }, 'Secrets status');
  });
});
