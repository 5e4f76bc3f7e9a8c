export const ANALYSIS_TYPES = [
  'business_insights',
  'sentiment',
  'chart_interpretation',
  'reasoning',
  'pattern_recognition',
  'custom_analysis',
  'question_generation'
] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export type ModelRole = 'primary' | 'secondary' | 'fallback';

export type ModelConfig = {
  role: ModelRole;
  id: string;
  temperature: number;
  maxOutputTokens: number;
  strengths: string[];
};

export type ModelIds = Record<ModelRole, string>;

export const DEFAULT_MODEL_IDS: ModelIds = {
  primary: 'gemini-2.5-flash',
  secondary: 'gemini-2.5-pro',
  fallback: 'gemini-2.0-flash'
};

// Low temperatures keep repeated answers close; reasoning work runs coolest.
export const buildRoster = (ids: ModelIds = DEFAULT_MODEL_IDS): ModelConfig[] => [
  {
    role: 'primary',
    id: ids.primary,
    temperature: 0.3,
    maxOutputTokens: 800,
    strengths: ['business_insights', 'sentiment', 'chart_interpretation']
  },
  {
    role: 'secondary',
    id: ids.secondary,
    temperature: 0.2,
    maxOutputTokens: 1000,
    strengths: ['reasoning', 'pattern_recognition', 'custom_analysis', 'question_generation']
  },
  {
    role: 'fallback',
    id: ids.fallback,
    temperature: 0.4,
    maxOutputTokens: 600,
    strengths: ['general', 'fast', 'reliable']
  }
];

export const preferredModel = (roster: ModelConfig[], analysisType: string) =>
  roster.find(model => model.strengths.includes(analysisType)) ?? roster[0];

/** Preferred model first, then the rest of the roster in order, each model once. */
export const modelOrder = (roster: ModelConfig[], analysisType: string) => {
  const first = preferredModel(roster, analysisType);
  return [first, ...roster.filter(model => model !== first)];
};
