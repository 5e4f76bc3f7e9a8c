import { createHash } from 'crypto';
import { ColumnStats, DataProfile } from '../types/profile';
import { Catalog, Dataset, DataType, DomainId } from '../types/schema';
import { analyzeColumn } from './columns';
import { extractBusinessInsights, detectPatterns, strongCorrelations } from './business';
import { assessQuality } from './quality';

export { analyzeColumn } from './columns';
export { assessQuality, QUALITY_RULES } from './quality';

export const fingerprint = (dataset: Dataset, domain: DomainId) => {
  const columnHash = createHash('sha1').update(JSON.stringify(dataset.columns)).digest('hex');
  return `${domain}|${dataset.rows.length}|${columnHash}`;
};

const formatNumber = (value: number) => value.toLocaleString('en-US', { maximumFractionDigits: 2 });

const quickFacts = (profile: Omit<DataProfile, 'quickFacts' | 'timestamp'>) => {
  const facts = [`${profile.metadata.totalRows} rows across ${profile.metadata.totalColumns} columns`];
  const { quality, businessInsights, columnAnalysis } = profile;

  facts.push(`${quality.missingPercentage}% of cells are empty`);
  if (quality.duplicatePercentage > 0) facts.push(`${quality.duplicatePercentage}% of rows are duplicates`);

  const numeric = Object.keys(columnAnalysis).filter(col => columnAnalysis[col].numeric);
  if (numeric.length) facts.push(`Numeric columns: ${numeric.join(', ')}`);
  const dates = Object.keys(columnAnalysis).filter(col => columnAnalysis[col].date);
  if (dates.length) facts.push(`Date columns: ${dates.join(', ')}`);

  const { amountColumn, totalRevenue, uniqueCustomers } = businessInsights.keyMetrics;
  if (amountColumn && totalRevenue !== undefined) facts.push(`Total ${amountColumn}: ${formatNumber(totalRevenue)}`);
  if (uniqueCustomers !== undefined) facts.push(`${uniqueCustomers} unique customers`);
  return facts;
};

export const buildProfile = (dataset: Dataset, domain: DomainId, catalog: Catalog): DataProfile => {
  const columnAnalysis: Record<string, ColumnStats> = {};
  const dataTypes: Record<string, DataType> = {};
  for (const column of dataset.columns) {
    const stats = analyzeColumn(dataset.rows.map(row => row[column]));
    columnAnalysis[column] = stats;
    dataTypes[column] = stats.dataType;
  }

  const base = {
    fingerprint: fingerprint(dataset, domain),
    metadata: {
      businessType: domain,
      totalRows: dataset.rows.length,
      totalColumns: dataset.columns.length,
      columnNames: dataset.columns.slice(),
      dataTypes
    },
    columnAnalysis,
    quality: assessQuality(dataset, columnAnalysis),
    businessInsights: extractBusinessInsights(dataset, columnAnalysis, catalog),
    patterns: detectPatterns(dataset, columnAnalysis),
    relationships: { strongCorrelations: strongCorrelations(dataset, columnAnalysis) }
  };

  return { ...base, quickFacts: quickFacts(base), timestamp: new Date().toISOString() };
};

/** The parts of a profile an insight prompt needs: shape, quality, key metrics and quick facts. */
export const profileContext = (profile: DataProfile) => ({
  rows: profile.metadata.totalRows,
  columns: profile.metadata.totalColumns,
  dataTypes: profile.metadata.dataTypes,
  quality: {
    score: profile.quality.score,
    missingPercentage: profile.quality.missingPercentage,
    duplicatePercentage: profile.quality.duplicatePercentage,
    issues: profile.quality.issues
  },
  keyMetrics: profile.businessInsights.keyMetrics,
  quickFacts: profile.quickFacts
});

export type Profiler = {
  profile: (dataset: Dataset, domain: DomainId) => DataProfile;
  clear: () => void;
  size: () => number;
};

/** Session-scoped profiler; repeated calls for the same fingerprint return the cached profile. */
export const createProfiler = (catalog: Catalog): Profiler => {
  const cache = new Map<string, DataProfile>();

  return {
    profile: (dataset, domain) => {
      const key = fingerprint(dataset, domain);
      const cached = cache.get(key);
      if (cached) return cached;
      const profile = buildProfile(dataset, domain, catalog);
      cache.set(key, profile);
      return profile;
    },
    clear: () => cache.clear(),
    size: () => cache.size
  };
};
