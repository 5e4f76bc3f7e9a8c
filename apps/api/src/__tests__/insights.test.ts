import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getDomain, loadCatalog } from '../catalog';
import { createInsightClient, modelOrder, buildRoster, stableStringify, staticInsight, TtlCache } from '../insights';
import type { ModelCall, ModelRequest } from '../insights';

const catalog = loadCatalog();
const retail = getDomain(catalog, 'retail');

const noSleep = () => Promise.resolve();

// records every request and answers with the given handler
const recorder = (answer: (request: ModelRequest) => Promise<string>) => {
  const calls: ModelRequest[] = [];
  const modelCall: ModelCall = request => {
    calls.push(request);
    return answer(request);
  };
  return { calls, modelCall };
};

describe('insight client', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('answers repeated requests from the cache with the primary model', async () => {
    const { calls, modelCall } = recorder(async () => 'Revenue is concentrated in two products.');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });

    const first = await client.generate({ totalRevenue: 500 }, 'retail', 'business_insights');
    const second = await client.generate({ totalRevenue: 500 }, 'retail', 'business_insights');

    expect(first).toBe('Revenue is concentrated in two products.');
    expect(second).toBe(first);
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({ model: 'gemini-2.5-flash', temperature: 0.3, maxOutputTokens: 800 });
  });

  it('builds the same prompt regardless of payload key order', async () => {
    const { calls, modelCall } = recorder(async () => 'ok');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });

    await client.generate({ a: 1, b: { y: 2, x: 3 } }, 'retail', 'business_insights');
    await client.generate({ b: { x: 3, y: 2 }, a: 1 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(1);
  });

  it('retries each model and then falls back to a static summary', async () => {
    const { calls, modelCall } = recorder(async () => {
      throw new Error('quota exceeded');
    });
    const sleep = vi.fn(noSleep);
    const client = createInsightClient({ catalog, modelCall, sleep, retryDelayMs: 5 });

    const text = await client.generate({ totalRevenue: 1234.5 }, 'retail', 'business_insights');

    expect(calls.map(c => c.model)).toEqual([
      'gemini-2.5-flash',
      'gemini-2.5-flash',
      'gemini-2.5-flash',
      'gemini-2.5-pro',
      'gemini-2.5-pro',
      'gemini-2.5-pro',
      'gemini-2.0-flash',
      'gemini-2.0-flash',
      'gemini-2.0-flash'
    ]);
    expect(sleep).toHaveBeenCalledTimes(6);
    expect(sleep).toHaveBeenCalledWith(5);
    expect(text.split('\n')[0]).toBe('Business insights summary for Retail & E-commerce');
    expect(text).toContain('- Total Revenue: 1,234.5');
    expect(console.warn).toHaveBeenCalledWith('[insights] gemini-2.5-flash failed (attempt 1): quota exceeded');
  });

  it('does not cache the static fallback', async () => {
    let healthy = false;
    const { calls, modelCall } = recorder(async () => (healthy ? 'recovered' : ''));
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep, retries: 0 });

    await client.generate({ orders: 3 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(3);
    healthy = true;
    expect(await client.generate({ orders: 3 }, 'retail', 'business_insights')).toBe('recovered');
  });

  it('counts an empty response as a failure', async () => {
    const { calls, modelCall } = recorder(async () => '   ');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });

    const text = await client.generate({}, 'retail', 'business_insights');
    expect(calls).toHaveLength(9);
    expect(text).toContain('The analysis covers your retail e-commerce business data.');
    expect(console.warn).toHaveBeenCalledWith('[insights] gemini-2.5-flash returned an empty response (attempt 1)');
  });

  it('starts with the model suited to the analysis type', async () => {
    const { calls, modelCall } = recorder(async request => {
      if (request.model === 'gemini-2.5-pro') throw new Error('unavailable');
      return 'answer';
    });
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });

    expect(await client.generate({ question: 'why' }, 'retail', 'custom_analysis')).toBe('answer');
    expect(calls.map(c => c.model)).toEqual(['gemini-2.5-pro', 'gemini-2.5-pro', 'gemini-2.5-pro', 'gemini-2.5-flash']);
  });

  it('gives up on a model call that never settles', async () => {
    const { calls, modelCall } = recorder(() => new Promise<string>(() => {}));
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep, retries: 0, timeoutMs: 10 });

    const text = await client.generate({ totalRevenue: 10 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(3);
    expect(text).toContain('- Total Revenue: 10');
    expect(console.warn).toHaveBeenCalledWith('[insights] gemini-2.5-flash failed (attempt 1): gemini-2.5-flash timed out after 10ms');
  });

  it('expires cached entries after the ttl', async () => {
    let clock = 0;
    const { calls, modelCall } = recorder(async () => 'fresh');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep, cacheTtlMs: 1000, now: () => clock });

    await client.generate({ n: 1 }, 'retail', 'business_insights');
    clock = 999;
    await client.generate({ n: 1 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(1);
    clock = 1000;
    await client.generate({ n: 1 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(2);
  });

  it('evicts the least recently used entry', async () => {
    const { calls, modelCall } = recorder(async () => 'text');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep, cacheMaxEntries: 2 });

    await client.generate({ n: 1 }, 'retail', 'business_insights');
    await client.generate({ n: 2 }, 'retail', 'business_insights');
    await client.generate({ n: 3 }, 'retail', 'business_insights');
    expect(client.cacheStats().entries).toBe(2);

    await client.generate({ n: 3 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(3);
    await client.generate({ n: 1 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(4);
  });

  it('answers from the payload when no model is configured', async () => {
    const client = createInsightClient({ catalog });
    const text = await client.generate({ totalRevenue: 1234.5 }, 'retail', 'business_insights');
    expect(text).toBe(staticInsight({ totalRevenue: 1234.5 }, retail));
    expect(client.cacheStats()).toEqual({
      entries: 0,
      maxEntries: 500,
      ttlMs: 3600000,
      models: ['gemini-2.5-flash', 'gemini-2.5-pro', 'gemini-2.0-flash'],
      configured: false
    });
  });

  it('prints bigint values as strings in the prompt', async () => {
    const { calls, modelCall } = recorder(async () => 'Revenue is steady.');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });

    expect(await client.generate({ revenue: 10n, orders: 2 }, 'retail', 'business_insights')).toBe('Revenue is steady.');
    expect(calls[0].prompt).toContain('"revenue": "10"');
  });

  it('answers a payload that cannot be serialised from the payload itself', async () => {
    const { calls, modelCall } = recorder(async () => 'never asked');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });
    const payload: Record<string, unknown> = { orders: 3 };
    payload.self = payload;

    const text = await client.generate(payload, 'retail', 'business_insights');
    expect(text).toBe(staticInsight(payload, retail));
    expect(text).toContain('- Orders: 3');
    expect(calls).toHaveLength(0);
    expect(client.cacheStats().entries).toBe(0);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^\[insights\] could not serialise the business_insights payload: /)
    );

    expect(await client.generateQuestions(payload, 'retail')).toEqual(retail.questions.map(q => q.text).slice(0, 5));
  });

  it('clears the cache', async () => {
    const { calls, modelCall } = recorder(async () => 'text');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });
    await client.generate({ n: 1 }, 'retail', 'business_insights');
    client.clearCache();
    expect(client.cacheStats().entries).toBe(0);
    await client.generate({ n: 1 }, 'retail', 'business_insights');
    expect(calls).toHaveLength(2);
  });
});

describe('generateQuestions', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('parses a JSON array from the reasoning model', async () => {
    const { calls, modelCall } = recorder(async () => '```json\n["Which region grew fastest?", "Who buys most often?"]\n```');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });

    const questions = await client.generateQuestions({ columns: ['Region', 'Customer'] }, 'retail');
    expect(questions).toEqual(['Which region grew fastest?', 'Who buys most often?']);
    expect(calls.map(c => c.model)).toEqual(['gemini-2.5-pro']);
  });

  it('reads one question per line when the answer is not JSON', async () => {
    const { modelCall } = recorder(async () => '1. First question?\n- Second question?\n\n');
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });
    expect(await client.generateQuestions({ columns: [] }, 'retail')).toEqual(['First question?', 'Second question?']);
  });

  it('falls back to the domain questions', async () => {
    const { calls, modelCall } = recorder(async () => {
      throw new Error('down');
    });
    const client = createInsightClient({ catalog, modelCall, sleep: noSleep });

    expect(await client.generateQuestions({ columns: [] }, 'retail')).toEqual([
      'Which products bring in the most money?',
      'Which products sell the least?',
      'How have sales changed month by month?',
      'Are there seasonal trends in sales?',
      'How much do customers spend per order?'
    ]);
    expect(calls).toHaveLength(3);
  });
});

describe('helpers', () => {
  it('sorts keys at every level', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [3] } })).toBe(
      stableStringify({ a: { c: [3], d: 2 }, b: 1 })
    );
    expect(stableStringify({ b: 1, a: 2 })).toBe('{\n  "a": 2,\n  "b": 1\n}');
  });

  it('puts the preferred model first and keeps the rest in order', () => {
    const roster = buildRoster();
    expect(modelOrder(roster, 'reasoning').map(m => m.role)).toEqual(['secondary', 'primary', 'fallback']);
    expect(modelOrder(roster, 'unknown').map(m => m.role)).toEqual(['primary', 'secondary', 'fallback']);
  });

  it('writes the static summary with recommendations', () => {
    expect(staticInsight({ totalRevenue: 1234.5, nested: { orderCount: 3 }, label: 'x' }, retail)).toBe(
      [
        'Business insights summary for Retail & E-commerce',
        '',
        'Key metrics:',
        '- Total Revenue: 1,234.5',
        '- Nested order count: 3',
        '',
        'Recommendations:',
        '1. Track revenue and profit margin regularly',
        '2. Investigate significant trends or outliers',
        '3. Compare results period over period before acting'
      ].join('\n')
    );
  });

  it('expires and evicts in the ttl cache', () => {
    let clock = 0;
    const cache = new TtlCache<string>(100, 2, () => clock);
    cache.set('a', '1');
    cache.set('b', '2');
    expect(cache.get('a')).toBe('1');
    cache.set('c', '3');
    expect(cache.get('b')).toBeUndefined();
    expect(cache.size).toBe(2);
    clock = 100;
    expect(cache.get('a')).toBeUndefined();
  });
});
