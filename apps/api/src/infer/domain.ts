import { GENERAL_DOMAIN_ID } from '../catalog';
import { Catalog, Classification, DomainProfile, PATTERN_CATEGORIES } from '../types/schema';
import { domainPatterns } from '../utils/keywords';

export type DomainScore = {
  domain: string;
  matched: number;
  total: number;
  score: number;
};

const scoreDomain = (domain: DomainProfile, columnNames: string[]): DomainScore => {
  const text = columnNames.map(c => c.toLowerCase()).join(' ');
  let matched = 0;
  let total = 0;

  for (const keyword of domain.keywords) {
    total++;
    if (text.includes(keyword.toLowerCase())) matched++;
  }

  for (const category of PATTERN_CATEGORIES) {
    for (const pattern of domainPatterns(domain, category)) {
      total++;
      if (columnNames.some(col => pattern.test(col))) matched++;
    }
  }

  return { domain: domain.id, matched, total, score: total ? matched / total : 0 };
};

/** Scores for every classifiable domain, in registration order. */
export const scoreDomains = (columnNames: string[], catalog: Catalog): DomainScore[] =>
  catalog.domains
    .filter(d => d.id !== GENERAL_DOMAIN_ID)
    .map(d => scoreDomain(d, columnNames))
    .filter(s => s.total > 0);

export const classifyDomain = (columnNames: string[], catalog: Catalog): Classification => {
  let best: DomainScore | null = null;
  for (const score of scoreDomains(columnNames, catalog)) {
    // strict comparison keeps the first registered domain on ties
    if (!best || score.score > best.score) best = score;
  }

  if (!best || best.score <= 0) return { domain: GENERAL_DOMAIN_ID, confidence: 0 };
  return { domain: best.domain, confidence: Number(best.score.toFixed(4)) };
};
