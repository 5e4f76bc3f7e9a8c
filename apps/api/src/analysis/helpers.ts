import { Dataset } from '../types/schema';
import { cellKey, isMissing, round, toDate, toNumber } from '../utils/values';
import { AnalysisContext, AnalysisResult, TableData } from './types';

/** Raw column behind the first mapped field of the given family. */
export const columnFor = (context: AnalysisContext, family: string) => {
  for (const field of context.domain.fields) {
    if (field.family !== family) continue;
    const column = context.mapping[field.name];
    if (column) return { field: field.name, column };
  }
  return null;
};

export type Resolved = { ok: true; columns: Record<string, string> } | { ok: false; missing: string[] };

/** Raw columns keyed by family; `missing` lists the families nothing is mapped to. */
export const resolveColumns = (context: AnalysisContext, families: string[]): Resolved => {
  const missing: string[] = [];
  const columns: Record<string, string> = {};
  for (const family of families) {
    const resolved = columnFor(context, family);
    if (resolved) columns[family] = resolved.column;
    else missing.push(family);
  }
  if (missing.length) return { ok: false, missing };
  return { ok: true, columns };
};

export const missingColumns = (families: string[]): AnalysisResult => ({
  summary: `Missing required columns: ${families.join(', ')}. Map them during column mapping to run this analysis.`,
  figure: null,
  table: null
});

export const noData = (what: string): AnalysisResult => ({
  summary: `No valid data found for ${what}. Check that these columns are populated.`,
  figure: null,
  table: null
});

export const formatAmount = (value: number) => value.toLocaleString('en-US', { maximumFractionDigits: 2 });

export const percent = (part: number, whole: number) => (whole ? round((part / whole) * 100, 1) : 0);

export type GroupTotal = { key: string; total: number; count: number };

/** Sums `valueColumn` per distinct `keyColumn`, skipping rows where either side is missing. */
export const sumBy = (dataset: Dataset, keyColumn: string, valueColumn: string): GroupTotal[] => {
  const groups = new Map<string, GroupTotal>();
  for (const row of dataset.rows) {
    const rawKey = row[keyColumn];
    const value = toNumber(row[valueColumn]);
    if (isMissing(rawKey) || value === null) continue;
    const key = cellKey(rawKey);
    const group = groups.get(key) ?? { key, total: 0, count: 0 };
    group.total += value;
    group.count++;
    groups.set(key, group);
  }
  return Array.from(groups.values()).map(g => ({ ...g, total: round(g.total) }));
};

export const datedAmounts = (dataset: Dataset, dateColumn: string, amountColumn: string) => {
  const points: Array<{ date: Date; amount: number }> = [];
  for (const row of dataset.rows) {
    const date = toDate(row[dateColumn]);
    const amount = toNumber(row[amountColumn]);
    if (date && amount !== null) points.push({ date, amount });
  }
  return points;
};

export const groupTable = (groups: GroupTotal[], keyLabel: string, totalLabel: string): TableData => ({
  columns: [keyLabel, totalLabel, 'Rows'],
  rows: groups.map(g => ({ [keyLabel]: g.key, [totalLabel]: g.total, Rows: g.count }))
});

const TRUTHY = new Set(['true', 'yes', 'y', '1', 'returned', 'refunded']);

export const isTruthy = (value: unknown) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return TRUTHY.has(String(value ?? '').trim().toLowerCase());
};
