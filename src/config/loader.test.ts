import { afterEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../lib/errors';
import { DEFAULT_CONFIG, mergeConfig, parseUserConfig, redactConfig, resolveSecret } from './loader';

describe('parseUserConfig', () => {
  it('treats an empty file as no overrides', () => {
    expect(parseUserConfig(null, 'config.yaml')).toEqual({});
  });

  it('accepts partial sections', () => {
    expect(parseUserConfig({ resolution: { concurrency: 4 } }, 'config.yaml')).toEqual({
      resolution: { concurrency: 4 },
    });
  });

  it('rejects values outside the allowed range', () => {
    expect(() => parseUserConfig({ resolution: { batchSize: 5000 } }, 'config.yaml')).toThrow(ConfigError);
    expect(() => parseUserConfig({ matching: { personNameThreshold: 1.5 } }, 'config.yaml')).toThrow(
      'Invalid configuration in config.yaml: matching.personNameThreshold: Number must be less than or equal to 1'
    );
  });
});

describe('mergeConfig', () => {
  it('overrides only the keys the user set', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { airtable: { enabled: true }, resolution: { batchSize: 25 } });

    expect(merged.airtable).toEqual({ ...DEFAULT_CONFIG.airtable, enabled: true });
    expect(merged.resolution).toEqual({ batchSize: 25, concurrency: 1, lookupTimeoutMs: 20000 });
    expect(merged.hubspot).toEqual(DEFAULT_CONFIG.hubspot);
  });
});

describe('resolveSecret', () => {
  afterEach(() => {
    delete process.env.LEAD_RESOLVER_TEST_SECRET;
  });

  it('reads ${NAME} references from the environment', () => {
    process.env.LEAD_RESOLVER_TEST_SECRET = 'test-secret';
    expect(resolveSecret('${LEAD_RESOLVER_TEST_SECRET}', 'hubspot.accessToken')).toBe('test-secret');
  });

  it('passes literal values through', () => {
    expect(resolveSecret('test-secret', 'airtable.token')).toBe('test-secret');
  });

  it('fails when the referenced variable is unset', () => {
    expect(() => resolveSecret('${LEAD_RESOLVER_TEST_SECRET}', 'airtable.token')).toThrow(
      'airtable.token: env var LEAD_RESOLVER_TEST_SECRET is not set'
    );
  });
});

describe('redactConfig', () => {
  it('masks literal tokens and leaves env references readable', () => {
    const redacted = redactConfig(
      mergeConfig(DEFAULT_CONFIG, { hubspot: { accessToken: 'test-token-1234' } })
    );

    expect(redacted.hubspot.accessToken).toBe('****1234');
    expect(redacted.airtable.token).toBe('${AIRTABLE_TOKEN}');
  });
});
