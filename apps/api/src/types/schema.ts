export type DataType = 'string' | 'number' | 'boolean' | 'date' | 'uuid' | 'currency' | 'unknown';

export type Row = Record<string, unknown>;

export type Dataset = {
  name: string;
  columns: string[];
  rows: Row[];
  source?: string; // csv|excel|memory
};

export type DomainId = string;
export type TierId = string;
export type CapabilityId = string;

export type PatternCategory = 'date' | 'amount' | 'customer' | 'location';

export const PATTERN_CATEGORIES: readonly PatternCategory[] = ['date', 'amount', 'customer', 'location'];

export type FieldDefinition = {
  name: string;
  family?: string;
};

export type Tier = {
  id: TierId;
  label: string;
  fields: string[];
  capabilities: CapabilityId[];
};

export type DomainContext = {
  domainKnowledge: string;
  keyMetrics: string[];
  commonChallenges: string[];
};

export type QuestionDefinition = {
  id: string;
  text: string;
  description?: string;
  requiredFields: string[];
};

export type DomainProfile = {
  id: DomainId;
  name: string;
  description?: string;
  keywords: string[];
  patterns: Partial<Record<PatternCategory, string[]>>;
  fields: FieldDefinition[];
  tiers: Tier[]; // lowest (essential) first
  context: DomainContext;
  questions: QuestionDefinition[];
};

export type CatalogSettings = {
  fuzzyMatchThreshold: number;
};

export type Catalog = {
  version: number;
  settings: CatalogSettings;
  keywordFamilies: Record<string, string[]>;
  domains: DomainProfile[]; // registration order
  warnings: string[];
};

export type CanonicalField = {
  readonly name: string;
  readonly domain: DomainId;
  readonly tier: TierId;
};

// canonical field name -> raw column name
export type ColumnMapping = Readonly<Record<string, string>>;

export type Classification = {
  domain: DomainId;
  confidence: number; // 0..1
};
