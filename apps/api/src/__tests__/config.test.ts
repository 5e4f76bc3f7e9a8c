import { describe, it, expect } from 'vitest';
import { DEFAULT_CATALOG_PATH } from '../catalog';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      geminiApiKey: '',
      models: { primary: 'gemini-2.5-flash', secondary: 'gemini-2.5-pro', fallback: 'gemini-2.0-flash' },
      insightCacheTtlMs: 3600000,
      insightCacheMaxEntries: 500,
      insightRetryDelayMs: 1000,
      insightTimeoutMs: 20000,
      fuzzyMatchThreshold: undefined,
      catalogPath: DEFAULT_CATALOG_PATH
    });
  });

  it('reads overrides and ignores values that do not parse', () => {
    const config = loadConfig({
      PORT: '9090',
      GEMINI_API_KEY: 'test-secret',
      GEMINI_SECONDARY_MODEL: 'reasoner',
      INSIGHT_CACHE_TTL_MS: 'soon',
      FUZZY_MATCH_THRESHOLD: '0.75',
      CATALOG_PATH: '/tmp/catalog.json'
    });
    expect(config.port).toBe(9090);
    expect(config.geminiApiKey).toBe('test-secret');
    expect(config.models.secondary).toBe('reasoner');
    expect(config.insightCacheTtlMs).toBe(3600000);
    expect(config.fuzzyMatchThreshold).toBe(0.75);
    expect(config.catalogPath).toBe('/tmp/catalog.json');
  });

  it('drops a fuzzy threshold outside 0..1', () => {
    expect(loadConfig({ FUZZY_MATCH_THRESHOLD: '1.5' }).fuzzyMatchThreshold).toBeUndefined();
  });
});
