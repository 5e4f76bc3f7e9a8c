export { createInsightClient, cacheKey } from './client';
export type { InsightClient, InsightClientOptions } from './client';
export { createGeminiModelCall } from './gemini';
export type { ModelCall, ModelRequest } from './gemini';
export { ANALYSIS_TYPES, DEFAULT_MODEL_IDS, buildRoster, modelOrder, preferredModel } from './models';
export type { AnalysisType, ModelConfig, ModelIds } from './models';
export { TtlCache } from './cache';
export { buildPrompt, stableStringify } from './prompt';
export type { InsightPayload } from './prompt';
export { staticInsight, staticQuestions } from './fallback';
