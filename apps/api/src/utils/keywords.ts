import { Catalog, DomainProfile, PatternCategory } from '../types/schema';

// One lookup table for "amount-like", "date-like", ... columns. The classifier,
// the column mapper and the profiler all go through these helpers.

export const compilePatterns = (sources: string[] = []) => sources.map(source => new RegExp(source, 'i'));

export const containsKeyword = (text: string, keywords: string[]) => {
  const lower = text.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword.toLowerCase()));
};

export const familyKeywords = (catalog: Catalog, family?: string) =>
  family ? catalog.keywordFamilies[family] ?? [] : [];

export const domainPatterns = (domain: DomainProfile, category: PatternCategory) =>
  compilePatterns(domain.patterns[category]);

export const columnsInFamily = (columns: string[], catalog: Catalog, family: string) => {
  const keywords = familyKeywords(catalog, family);
  if (!keywords.length) return [];
  return columns.filter(col => containsKeyword(col, keywords));
};
