import { createHash } from 'crypto';
import { getDomain } from '../catalog';
import { Catalog, DomainId, DomainProfile } from '../types/schema';
import { TtlCache, CacheStats } from './cache';
import { staticInsight, staticQuestions } from './fallback';
import { ModelCall } from './gemini';
import { ModelConfig, ModelIds, buildRoster, modelOrder, preferredModel } from './models';
import { InsightPayload, buildPrompt } from './prompt';

export type InsightClientOptions = {
  catalog: Catalog;
  modelCall?: ModelCall | null;
  models?: ModelIds;
  cacheTtlMs?: number;
  cacheMaxEntries?: number;
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export type InsightClient = {
  generate: (payload: InsightPayload, domain: DomainId, analysisType: string) => Promise<string>;
  generateQuestions: (structure: InsightPayload, domain: DomainId) => Promise<string[]>;
  clearCache: () => void;
  cacheStats: () => CacheStats & { models: string[]; configured: boolean };
};

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

const withTimeout = async <T>(promise: Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export const cacheKey = (prompt: string, modelId: string, domain: DomainId, analysisType: string) =>
  createHash('sha256').update([prompt, modelId, domain, analysisType].join('|')).digest('hex');

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

// JSON array of strings, otherwise one question per line
const parseQuestions = (text: string): string[] => {
  const cleaned = text.replace(/```json/g, '').replace(/```/g, '').trim();
  const parsed = parseJson(cleaned);
  if (Array.isArray(parsed)) {
    return parsed.filter((q): q is string => typeof q === 'string' && q.trim() !== '').map(q => q.trim());
  }
  return cleaned
    .split('\n')
    .map(line => line.replace(/^\s*(?:[-*]|\d+[.)])\s*/, '').trim())
    .filter(Boolean);
};

/**
 * Insight generation with caching, per-model retries and a model fallback chain.
 * `generate` never rejects: when every model fails it answers with a summary
 * assembled from the payload.
 */
export const createInsightClient = (options: InsightClientOptions): InsightClient => {
  const {
    catalog,
    modelCall = null,
    retries = 2,
    retryDelayMs = 1000,
    timeoutMs = 20000,
    sleep = defaultSleep
  } = options;
  const roster = buildRoster(options.models);
  const cache = new TtlCache<string>(options.cacheTtlMs ?? 3600000, options.cacheMaxEntries ?? 500, options.now);

  const attempt = async (model: ModelConfig, prompt: string): Promise<string | null> => {
    if (!modelCall) return null;
    for (let i = 0; i <= retries; i++) {
      try {
        const text = await withTimeout(
          modelCall({ model: model.id, prompt, temperature: model.temperature, maxOutputTokens: model.maxOutputTokens }),
          timeoutMs,
          model.id
        );
        if (text.trim()) return text;
        console.warn(`[insights] ${model.id} returned an empty response (attempt ${i + 1})`);
      } catch (err: unknown) {
        console.warn(`[insights] ${model.id} failed (attempt ${i + 1}): ${errorMessage(err)}`);
      }
      if (i < retries) await sleep(retryDelayMs);
    }
    return null;
  };

  const runChain = async (models: ModelConfig[], prompt: string) => {
    for (const model of models) {
      const text = await attempt(model, prompt);
      if (text) return text;
    }
    return null;
  };

  const promptFor = (payload: InsightPayload, domain: DomainProfile, analysisType: string) => {
    try {
      return buildPrompt(payload, domain, analysisType);
    } catch (err: unknown) {
      console.warn(`[insights] could not serialise the ${analysisType} payload: ${errorMessage(err)}`);
      return null;
    }
  };

  const generate = async (payload: InsightPayload, domainId: DomainId, analysisType: string) => {
    const domain: DomainProfile = getDomain(catalog, domainId);
    const prompt = promptFor(payload, domain, analysisType);
    if (prompt === null) return staticInsight(payload, domain);
    const key = cacheKey(prompt, preferredModel(roster, analysisType).id, domain.id, analysisType);

    const cached = cache.get(key);
    if (cached !== undefined) return cached;

    const text = await runChain(modelOrder(roster, analysisType), prompt);
    if (!text) return staticInsight(payload, domain);

    cache.set(key, text);
    return text;
  };

  const generateQuestions = async (structure: InsightPayload, domainId: DomainId) => {
    const domain = getDomain(catalog, domainId);
    const analysisType = 'question_generation';
    const prompt = promptFor(structure, domain, analysisType);
    if (prompt === null) return staticQuestions(domain);
    const key = cacheKey(prompt, preferredModel(roster, analysisType).id, domain.id, analysisType);

    const cached = cache.get(key);
    if (cached !== undefined) return parseQuestions(cached);

    const text = await runChain([preferredModel(roster, analysisType)], prompt);
    const questions = text ? parseQuestions(text) : [];
    if (!questions.length) return staticQuestions(domain);

    cache.set(key, JSON.stringify(questions));
    return questions;
  };

  return {
    generate,
    generateQuestions,
    clearCache: () => cache.clear(),
    cacheStats: () => ({ ...cache.stats(), models: roster.map(m => m.id), configured: Boolean(modelCall) })
  };
};
