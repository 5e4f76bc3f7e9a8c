import { describe, it, expect } from 'vitest';
import { loadCatalog } from '../catalog';
import { analyzeColumn, createProfiler } from '../profile';
import type { Dataset, Row } from '../types/schema';

const catalog = loadCatalog();

const dataset = (columns: string[], rows: Row[]): Dataset => ({ name: 'test', columns, rows });

// ids 1..20 with the first `nulls` values blanked out
const withNulls = (nulls: number) =>
  dataset(
    ['id', 'value'],
    Array.from({ length: 20 }, (_, i) => ({ id: i + 1, value: i < nulls ? null : i + 1 }))
  );

describe('analyzeColumn', () => {
  it('computes numeric statistics and flags the outlier', () => {
    const stats = analyzeColumn([10, 12, 11, 13, 9, 500]);
    expect(stats.dataType).toBe('number');
    expect(stats.numeric).toMatchObject({
      min: 9,
      max: 500,
      median: 11.5,
      quartiles: { q1: 10.25, q2: 11.5, q3: 12.75 },
      outliersCount: 1,
      zeroCount: 0,
      negativeCount: 0
    });
    expect(stats.text).toBeUndefined();
  });

  it('coerces numeric strings and excludes unparseable values', () => {
    const stats = analyzeColumn(['1', '2', '$3', '4', 'n/a', '', null]);
    expect(stats.nullCount).toBe(2);
    expect(stats.dataType).toBe('number');
    expect(stats.numeric?.max).toBe(4);
    expect(stats.numeric?.std).toBeCloseTo(1.291, 3);
  });

  it('reports text statistics for string columns', () => {
    const stats = analyzeColumn(['red', 'blue', '', '  ', 'red', undefined]);
    expect(stats.dataType).toBe('string');
    expect(stats.nonNullCount).toBe(4);
    expect(stats.nullCount).toBe(2);
    expect(stats.nullPercentage).toBe(33.33);
    expect(stats.uniqueCount).toBe(3);
    expect(stats.mostCommonValue).toBe('red');
    expect(stats.mostCommonCount).toBe(2);
    expect(stats.text).toEqual({ avgLength: 3, minLength: 2, maxLength: 4, emptyStrings: 1, whitespaceOnly: 1 });
  });

  it('detects date columns and their distributions', () => {
    const stats = analyzeColumn(['2024-01-15', '2024-02-20', '2024-02-25', '2024-03-01']);
    expect(stats.dataType).toBe('date');
    expect(stats.date?.spanDays).toBe(46);
    expect(stats.date?.patterns.month).toEqual({ January: 1, February: 2, March: 1 });
    expect(stats.date?.patterns.dayOfWeek).toEqual({ Monday: 1, Tuesday: 1, Sunday: 1, Friday: 1 });
    expect(stats.date?.patterns.year).toEqual({ '2024': 4 });
    expect(stats.date?.patterns.hour).toBeUndefined();
  });

  it('does not treat plain numbers as dates', () => {
    const stats = analyzeColumn(['2019', '2020', '2021']);
    expect(stats.date).toBeUndefined();
    expect(stats.dataType).toBe('number');
  });

  it('handles an all-empty column', () => {
    const stats = analyzeColumn([null, '', undefined]);
    expect(stats.dataType).toBe('unknown');
    expect(stats.nullPercentage).toBe(100);
    expect(stats.mostCommonValue).toBeNull();
    expect(stats.date).toBeUndefined();
  });
});

describe('quality score', () => {
  // same shape means same fingerprint, so every case gets its own profiler
  const scoreOf = (data: Dataset) => createProfiler(catalog).profile(data, 'general').quality.score;

  it('only deducts once the null ratio passes 10%', () => {
    expect(scoreOf(withNulls(0))).toBe(100);
    expect(scoreOf(withNulls(4))).toBe(100);
    expect(scoreOf(withNulls(6))).toBe(80);
    expect(scoreOf(withNulls(12))).toBe(80);
  });

  it('pairs every issue with one recommendation', () => {
    const { quality } = createProfiler(catalog).profile(withNulls(6), 'general');
    expect(quality.issues).toEqual(['High missing values: 15.0%']);
    expect(quality.recommendations).toEqual(['Consider imputation strategies for missing values']);
    expect(quality.missingPercentage).toBe(15);
  });

  it('deducts for outliers', () => {
    const profile = createProfiler(catalog).profile(
      dataset(['reading'], [10, 12, 11, 13, 9, 500].map(reading => ({ reading }))),
      'general'
    );
    expect(profile.quality.score).toBe(90);
    expect(profile.quality.issues).toEqual(['Outliers detected in 1 numeric column(s)']);
    expect(profile.quality.recommendations).toEqual(['Investigate outliers for data quality issues']);
    expect(profile.columnAnalysis.reading.numeric?.outliersCount).toBe(1);
  });

  it('deducts for duplicate rows', () => {
    const rows = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7', 'p8', 'p1', 'p2'].map(sku => ({ sku, colour: 'red' }));
    const { quality } = createProfiler(catalog).profile(dataset(['sku', 'colour'], rows), 'general');
    expect(quality.score).toBe(85);
    expect(quality.issues).toEqual(['Duplicate rows: 20.0%']);
    expect(quality.recommendations).toEqual(['Review and remove duplicate records if appropriate']);
  });

  it('has no issues or recommendations for clean data', () => {
    const { quality } = createProfiler(catalog).profile(withNulls(0), 'general');
    expect(quality.issues).toEqual([]);
    expect(quality.recommendations).toEqual([]);
  });
});

describe('business insights and patterns', () => {
  const sales = dataset(
    ['customer_id', 'total', 'sale_date'],
    [
      { customer_id: 'c1', total: '10', sale_date: '2024-01-05' },
      { customer_id: 'c2', total: '20', sale_date: '2024-01-20' },
      { customer_id: 'c1', total: '30.5', sale_date: '2024-02-11' }
    ]
  );

  it('summarises amount, customer and date columns found by keyword', () => {
    const { businessInsights } = createProfiler(catalog).profile(sales, 'retail');
    expect(businessInsights.keyMetrics).toEqual({
      amountColumn: 'total',
      totalRevenue: 60.5,
      avgTransaction: 20.17,
      maxTransaction: 30.5,
      minTransaction: 10,
      customerColumn: 'customer_id',
      uniqueCustomers: 2,
      repeatCustomers: 1
    });
    expect(businessInsights.trends.dateColumn).toBe('sale_date');
    expect(businessInsights.trends.monthlyDistribution).toEqual({ '2024-01': 2, '2024-02': 1 });
    expect(businessInsights.trends.dateRange?.spanDays).toBe(37);
  });

  it('skips sections without a matching column', () => {
    const { businessInsights } = createProfiler(catalog).profile(dataset(['colour'], [{ colour: 'red' }]), 'retail');
    expect(businessInsights).toEqual({ keyMetrics: {}, trends: {} });
  });

  it('collects categorical and temporal patterns', () => {
    const { patterns } = createProfiler(catalog).profile(sales, 'retail');
    expect(patterns.categorical.customer_id).toEqual({ distribution: { c1: 2, c2: 1 }, dominantCategory: 'c1' });
    expect(Object.keys(patterns.temporal)).toEqual(['sale_date']);
  });

  it('finds strong correlations between numeric columns', () => {
    const rows = [1, 2, 3, 4, 5].map(x => ({ x, y: x * 2, z: [5, 1, 4, 2, 3][x - 1] }));
    const { relationships } = createProfiler(catalog).profile(dataset(['x', 'y', 'z'], rows), 'general');
    expect(relationships.strongCorrelations).toEqual([{ column1: 'x', column2: 'y', correlation: 1 }]);
  });

  it('writes quick facts', () => {
    const { quickFacts } = createProfiler(catalog).profile(sales, 'retail');
    expect(quickFacts[0]).toBe('3 rows across 3 columns');
    expect(quickFacts).toContain('Total total: 60.5');
    expect(quickFacts).toContain('2 unique customers');
  });
});

describe('createProfiler', () => {
  it('caches profiles by fingerprint', () => {
    const profiler = createProfiler(catalog);
    const data = withNulls(0);
    const first = profiler.profile(data, 'retail');
    expect(profiler.profile(data, 'retail')).toBe(first);
    expect(profiler.size()).toBe(1);
    expect(first.fingerprint.startsWith('retail|20|')).toBe(true);

    profiler.profile(data, 'general');
    expect(profiler.size()).toBe(2);
    expect(profiler.profile(withNulls(5), 'retail')).toBe(first);
    profiler.clear();
    expect(profiler.size()).toBe(0);
  });

  it('fills metadata', () => {
    const { metadata } = createProfiler(catalog).profile(withNulls(0), 'general');
    expect(metadata).toEqual({
      businessType: 'general',
      totalRows: 20,
      totalColumns: 2,
      columnNames: ['id', 'value'],
      dataTypes: { id: 'number', value: 'number' }
    });
  });
});

describe('large datasets', () => {
  const ROWS = 250_000;
  const DAY_MS = 24 * 60 * 60 * 1000;
  const start = Date.UTC(2024, 0, 1);

  const big = dataset(
    ['total', 'sale_date'],
    Array.from({ length: ROWS }, (_, i) => ({ total: (i % 1000) + 1, sale_date: new Date(start + (i % 366) * DAY_MS) }))
  );

  it('profiles a quarter of a million rows', () => {
    const profile = createProfiler(catalog).profile(big, 'retail');

    expect(profile.columnAnalysis.total.numeric).toMatchObject({ min: 1, max: 1000 });
    expect(profile.columnAnalysis.sale_date.date).toMatchObject({
      earliest: '2024-01-01T00:00:00.000Z',
      latest: '2024-12-31T00:00:00.000Z',
      spanDays: 365
    });
    expect(profile.columnAnalysis.sale_date.text).toMatchObject({ minLength: 24, maxLength: 24 });
    expect(profile.businessInsights.keyMetrics).toMatchObject({
      amountColumn: 'total',
      totalRevenue: 125125000,
      maxTransaction: 1000,
      minTransaction: 1
    });
  }, 60_000);
});
