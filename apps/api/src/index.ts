import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();
import { createApp } from './app';
import { loadCatalog } from './catalog';
import { loadConfig } from './config';
import { createGeminiModelCall, createInsightClient } from './insights';

const config = loadConfig();
const catalog = loadCatalog(config.catalogPath);

if (!config.geminiApiKey) {
  console.warn('GEMINI_API_KEY not set, insights fall back to static summaries');
}

const insights = createInsightClient({
  catalog,
  modelCall: config.geminiApiKey ? createGeminiModelCall(config.geminiApiKey, config.insightTimeoutMs) : null,
  models: config.models,
  cacheTtlMs: config.insightCacheTtlMs,
  cacheMaxEntries: config.insightCacheMaxEntries,
  retryDelayMs: config.insightRetryDelayMs,
  timeoutMs: config.insightTimeoutMs
});

const app = createApp({ catalog, insights, fuzzyMatchThreshold: config.fuzzyMatchThreshold });

app.listen(config.port, () => {
  console.log(`BizLens API running on ${config.port} (${catalog.domains.length} domains)`);
});
