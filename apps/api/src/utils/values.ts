import { isValid, parse, parseISO } from 'date-fns';

export const isMissing = (value: unknown) =>
  value === null ||
  value === undefined ||
  value === '' ||
  (typeof value === 'number' && Number.isNaN(value));

const CURRENCY_CHARS = /[$€£,\s]/g;

/** Numbers and numeric strings ("1200", "$1,200.50"); anything else is null. */
export const toNumber = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const cleaned = value.replace(CURRENCY_CHARS, '');
  if (!cleaned) return null;
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
};

const REFERENCE_DATE = new Date(2000, 0, 1);
const DATE_FORMATS = [
  'M/d/yyyy',
  'd/M/yyyy',
  'M/d/yyyy H:mm',
  'M/d/yyyy H:mm:ss',
  'd/M/yyyy H:mm',
  'yyyy/M/d',
  'd.M.yyyy',
  'd-M-yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
  'M/d/yy'
];

const parseDateString = (raw: string): Date | null => {
  const value = raw.trim();
  // plain numbers are not dates, even if date-fns would read them as years
  if (!/\d/.test(value) || !/[-/.,\s:]/.test(value)) return null;

  const iso = parseISO(value);
  if (isValid(iso)) return iso;

  for (const format of DATE_FORMATS) {
    const parsed = parse(value, format, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  return null;
};

export const toDate = (value: unknown): Date | null => {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value === 'string') return parseDateString(value);
  return null;
};

export const sum = (values: number[]) => values.reduce((acc, v) => acc + v, 0);

export const mean = (values: number[]) => (values.length ? sum(values) / values.length : 0);

// Math.min(...values) overflows the call stack on large columns
export const minOf = (values: number[]) => values.reduce((acc, v) => (v < acc ? v : acc), Infinity);

export const maxOf = (values: number[]) => values.reduce((acc, v) => (v > acc ? v : acc), -Infinity);

export const quantile = (values: number[], q: number) => {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  if (sorted[base + 1] !== undefined) {
    return sorted[base] + rest * (sorted[base + 1] - sorted[base]);
  }
  return sorted[base];
};

export const median = (values: number[]) => quantile(values, 0.5);

/** Sample standard deviation (n - 1). */
export const sampleStd = (values: number[]) => {
  if (values.length < 2) return null;
  const avg = mean(values);
  const variance = sum(values.map(v => (v - avg) ** 2)) / (values.length - 1);
  return Math.sqrt(variance);
};

export const tukeyBounds = (values: number[]) => {
  const q1 = quantile(values, 0.25);
  const q3 = quantile(values, 0.75);
  const iqr = q3 - q1;
  return { q1, q3, lower: q1 - 1.5 * iqr, upper: q3 + 1.5 * iqr };
};

export const countOutliers = (values: number[]) => {
  if (values.length < 4) return 0;
  const { lower, upper } = tukeyBounds(values);
  return values.filter(v => v < lower || v > upper).length;
};

export const pearson = (xs: number[], ys: number[]) => {
  if (xs.length !== ys.length || xs.length < 2) return null;
  const mx = mean(xs);
  const my = mean(ys);
  let num = 0;
  let dx = 0;
  let dy = 0;
  for (let i = 0; i < xs.length; i++) {
    num += (xs[i] - mx) * (ys[i] - my);
    dx += (xs[i] - mx) ** 2;
    dy += (ys[i] - my) ** 2;
  }
  if (!dx || !dy) return null;
  return num / Math.sqrt(dx * dy);
};

export const round = (value: number, digits = 2) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export const cellKey = (value: unknown) => (value instanceof Date ? value.toISOString() : String(value));
