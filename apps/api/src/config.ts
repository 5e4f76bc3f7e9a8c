import { DEFAULT_CATALOG_PATH } from './catalog';
import { DEFAULT_MODEL_IDS, ModelIds } from './insights';

export type AppConfig = {
  port: number;
  geminiApiKey: string;
  models: ModelIds;
  insightCacheTtlMs: number;
  insightCacheMaxEntries: number;
  insightRetryDelayMs: number;
  insightTimeoutMs: number;
  fuzzyMatchThreshold?: number;
  catalogPath: string;
};

const numberFrom = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const threshold = Number(env.FUZZY_MATCH_THRESHOLD);
  return {
    port: numberFrom(env.PORT, 8080),
    geminiApiKey: env.GEMINI_API_KEY || '',
    models: {
      primary: env.GEMINI_PRIMARY_MODEL || DEFAULT_MODEL_IDS.primary,
      secondary: env.GEMINI_SECONDARY_MODEL || DEFAULT_MODEL_IDS.secondary,
      fallback: env.GEMINI_FALLBACK_MODEL || DEFAULT_MODEL_IDS.fallback
    },
    insightCacheTtlMs: numberFrom(env.INSIGHT_CACHE_TTL_MS, 3600000),
    insightCacheMaxEntries: numberFrom(env.INSIGHT_CACHE_MAX_ENTRIES, 500),
    insightRetryDelayMs: numberFrom(env.INSIGHT_RETRY_DELAY_MS, 1000),
    insightTimeoutMs: numberFrom(env.INSIGHT_TIMEOUT_MS, 20000),
    // catalog settings win unless the environment overrides them
    fuzzyMatchThreshold:
      env.FUZZY_MATCH_THRESHOLD && threshold >= 0 && threshold <= 1 ? threshold : undefined,
    catalogPath: env.CATALOG_PATH || DEFAULT_CATALOG_PATH
  };
};
