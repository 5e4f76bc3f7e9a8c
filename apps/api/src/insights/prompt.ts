import { DomainProfile } from '../types/schema';

export type InsightPayload = Record<string, unknown>;

// JSON with object keys sorted at every level, so equal payloads print identically.
// BigInts print as strings; a circular payload still throws.
export const stableStringify = (value: unknown): string =>
  JSON.stringify(
    value,
    (_key, v: unknown) => {
      if (typeof v === 'bigint') return v.toString();
      if (v instanceof Date || v === null || typeof v !== 'object' || Array.isArray(v)) return v;
      return Object.fromEntries(Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    },
    2
  ) ?? 'null';

const TASKS: Record<string, string> = {
  business_insights: `TASK: Generate business insights for the analysis results below.
Keep them data-driven and specific to the numbers shown, and focus on growth and optimization opportunities.`,
  sentiment: `TASK: Analyze customer sentiment and provide actionable feedback insights.
Identify specific improvement areas and highlight positive feedback patterns to leverage.`,
  chart_interpretation: `TASK: Interpret the chart data below for a business owner.
Describe the main movement, the largest and smallest values, and what they mean for the business.`,
  pattern_recognition: `TASK: Describe the notable patterns in the data below.
Call out trends, seasonality and concentrations, with the numbers that support them.`,
  reasoning: `TASK: Reason step by step about the data below and state your conclusion clearly.`,
  custom_analysis: `TASK: Answer the user's question using only the data summary below.
If the data cannot answer it, say which columns would be needed.`,
  question_generation: `TASK: Generate 3-5 specific business questions that the available columns can answer.
Return them as a JSON array of strings.`
};

const TASK_FALLBACK = 'TASK: Summarize what the data below shows and what the business should do next.';

export const buildPrompt = (payload: InsightPayload, domain: DomainProfile, analysisType: string) => {
  const { context } = domain;
  return `
You are a senior business analyst specializing in ${context.domainKnowledge}.
Provide consistent, actionable insights based on the data analysis.

Focus on ${context.keyMetrics.join(', ') || 'the main business metrics'} as primary metrics.
Common challenges in this business: ${context.commonChallenges.join(', ') || 'not specified'}.

RESPONSE FORMAT:
1. Key Finding (1-2 sentences)
2. Business Impact (quantified when possible)
3. Actionable Recommendations (2-3 specific steps)
4. Risk/Opportunity Assessment

${TASKS[analysisType] ?? TASK_FALLBACK}

DOMAIN: ${domain.name}

DATA CONTEXT:
${stableStringify(payload)}
`.trim();
};
