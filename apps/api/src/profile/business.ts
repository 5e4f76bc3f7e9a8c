import { format } from 'date-fns';
import { BusinessInsights, ColumnStats, DataPatterns, Correlation } from '../types/profile';
import { Catalog, Dataset } from '../types/schema';
import { columnsInFamily } from '../utils/keywords';
import { cellKey, isMissing, maxOf, minOf, pearson, round, sum, toNumber } from '../utils/values';
import { parseDates, parseNumbers } from './columns';

const CATEGORICAL_LIMIT = 20;
const STRONG_CORRELATION = 0.7;

const columnValues = (dataset: Dataset, column: string) => dataset.rows.map(row => row[column]);

// Amount, date and customer sections come from the shared keyword families;
// a section without a matching column is left out.
export const extractBusinessInsights = (
  dataset: Dataset,
  columns: Record<string, ColumnStats>,
  catalog: Catalog
): BusinessInsights => {
  const insights: BusinessInsights = { keyMetrics: {}, trends: {} };

  const amountColumn = columnsInFamily(dataset.columns, catalog, 'amount').find(col => columns[col]?.numeric);
  if (amountColumn) {
    const amounts = parseNumbers(columnValues(dataset, amountColumn));
    insights.keyMetrics.amountColumn = amountColumn;
    insights.keyMetrics.totalRevenue = round(sum(amounts));
    insights.keyMetrics.avgTransaction = round(sum(amounts) / amounts.length);
    insights.keyMetrics.maxTransaction = maxOf(amounts);
    insights.keyMetrics.minTransaction = minOf(amounts);
  }

  const dateColumn = columnsInFamily(dataset.columns, catalog, 'date').find(col => columns[col]?.date);
  const dateInfo = dateColumn ? columns[dateColumn]?.date : undefined;
  if (dateColumn && dateInfo) {
    const monthly: Record<string, number> = {};
    parseDates(columnValues(dataset, dateColumn))
      .map(d => format(d, 'yyyy-MM'))
      .sort()
      .forEach(month => {
        monthly[month] = (monthly[month] || 0) + 1;
      });
    insights.trends.dateColumn = dateColumn;
    insights.trends.dateRange = { start: dateInfo.earliest, end: dateInfo.latest, spanDays: dateInfo.spanDays };
    insights.trends.monthlyDistribution = monthly;
  }

  const customerColumn = columnsInFamily(dataset.columns, catalog, 'customer')[0];
  if (customerColumn) {
    const visits = new Map<string, number>();
    columnValues(dataset, customerColumn)
      .filter(v => !isMissing(v))
      .forEach(v => visits.set(cellKey(v), (visits.get(cellKey(v)) || 0) + 1));
    insights.keyMetrics.customerColumn = customerColumn;
    insights.keyMetrics.uniqueCustomers = visits.size;
    insights.keyMetrics.repeatCustomers = Array.from(visits.values()).filter(count => count > 1).length;
  }

  return insights;
};

export const detectPatterns = (dataset: Dataset, columns: Record<string, ColumnStats>): DataPatterns => {
  const patterns: DataPatterns = { temporal: {}, categorical: {} };

  for (const column of dataset.columns) {
    const stats = columns[column];
    if (!stats) continue;
    if (stats.date) {
      patterns.temporal[column] = stats.date.patterns;
      continue;
    }
    if (stats.numeric || !stats.uniqueCount || stats.uniqueCount >= CATEGORICAL_LIMIT) continue;

    const distribution: Record<string, number> = {};
    let dominantCategory: string | null = null;
    for (const value of columnValues(dataset, column)) {
      if (isMissing(value)) continue;
      const key = cellKey(value);
      distribution[key] = (distribution[key] || 0) + 1;
      if (dominantCategory === null || distribution[key] > distribution[dominantCategory]) dominantCategory = key;
    }
    patterns.categorical[column] = { distribution, dominantCategory };
  }

  return patterns;
};

export const strongCorrelations = (dataset: Dataset, columns: Record<string, ColumnStats>): Correlation[] => {
  const numeric = dataset.columns.filter(col => columns[col]?.numeric);
  const found: Correlation[] = [];

  for (let i = 0; i < numeric.length; i++) {
    for (let j = i + 1; j < numeric.length; j++) {
      const xs: number[] = [];
      const ys: number[] = [];
      for (const row of dataset.rows) {
        const x = toNumber(row[numeric[i]]);
        const y = toNumber(row[numeric[j]]);
        if (x === null || y === null) continue;
        xs.push(x);
        ys.push(y);
      }
      const r = pearson(xs, ys);
      if (r !== null && Math.abs(r) > STRONG_CORRELATION) {
        found.push({ column1: numeric[i], column2: numeric[j], correlation: round(r, 3) });
      }
    }
  }

  return found;
};
