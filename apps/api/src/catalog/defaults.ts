import { Catalog, DomainContext, DomainProfile } from '../types/schema';

export const GENERAL_DOMAIN_ID = 'general';
export const DEFAULT_FUZZY_THRESHOLD = 0.6;

export const DEFAULT_CONTEXT: DomainContext = {
  domainKnowledge: 'small business',
  keyMetrics: ['revenue', 'transaction volume', 'customer count'],
  commonChallenges: ['cash flow', 'growth', 'customer retention']
};

export const DEFAULT_KEYWORD_FAMILIES: Record<string, string[]> = {
  date: ['date', 'time', 'created', 'timestamp'],
  amount: ['amount', 'total', 'revenue', 'sales', 'price', 'value'],
  customer: ['customer', 'client', 'buyer', 'user'],
  product: ['product', 'item', 'sku'],
  location: ['location', 'region', 'city', 'state', 'country']
};

// Used when the catalog file is missing, unreadable or has no usable general entry.
export const GENERAL_DOMAIN: DomainProfile = {
  id: GENERAL_DOMAIN_ID,
  name: 'General Business',
  description: 'Generic transactional data',
  keywords: [],
  patterns: {},
  fields: [
    { name: 'Date', family: 'date' },
    { name: 'Amount', family: 'amount' },
    { name: 'CustomerID', family: 'customer' },
    { name: 'Product', family: 'product' },
    { name: 'Location', family: 'location' }
  ],
  tiers: [
    { id: 'tier1_essential', label: 'Summary statistics', fields: ['Amount'], capabilities: ['summary_statistics'] },
    { id: 'tier2_enhanced', label: 'Trend analysis', fields: ['Date', 'Amount'], capabilities: ['trend_analysis'] }
  ],
  context: DEFAULT_CONTEXT,
  questions: []
};

export const defaultCatalog = (warnings: string[] = []): Catalog => ({
  version: 1,
  settings: { fuzzyMatchThreshold: DEFAULT_FUZZY_THRESHOLD },
  keywordFamilies: { ...DEFAULT_KEYWORD_FAMILIES },
  domains: [GENERAL_DOMAIN],
  warnings
});
