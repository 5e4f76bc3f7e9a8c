import { differenceInCalendarDays, format, getHours, getYear } from 'date-fns';
import { ColumnStats, DateDistributions, DateStats, NumericStats, TextStats } from '../types/profile';
import { inferDataType, isDateLike, isNumericType } from '../utils/profile';
import {
  cellKey,
  countOutliers,
  isMissing,
  maxOf,
  mean,
  median,
  minOf,
  quantile,
  round,
  sampleStd,
  toDate,
  toNumber
} from '../utils/values';

const percentage = (part: number, whole: number) => (whole ? round((part / whole) * 100) : 0);

const countBy = <T>(items: T[], key: (item: T) => string) => {
  const counts: Record<string, number> = {};
  items.forEach(item => {
    const k = key(item);
    counts[k] = (counts[k] || 0) + 1;
  });
  return counts;
};

export const numericStats = (numbers: number[]): NumericStats | undefined => {
  if (!numbers.length) return undefined;
  const std = sampleStd(numbers);
  return {
    min: minOf(numbers),
    max: maxOf(numbers),
    mean: round(mean(numbers), 4),
    median: median(numbers),
    std: std === null ? null : round(std, 4),
    quartiles: {
      q1: quantile(numbers, 0.25),
      q2: quantile(numbers, 0.5),
      q3: quantile(numbers, 0.75)
    },
    outliersCount: countOutliers(numbers),
    zeroCount: numbers.filter(n => n === 0).length,
    negativeCount: numbers.filter(n => n < 0).length
  };
};

const textStats = (values: unknown[]): TextStats => {
  const strings = values.filter(v => v !== null && v !== undefined).map(v => cellKey(v));
  const present = strings.filter(s => s !== '');
  const lengths = present.map(s => s.length);
  return {
    avgLength: lengths.length ? round(mean(lengths)) : 0,
    minLength: lengths.length ? minOf(lengths) : 0,
    maxLength: lengths.length ? maxOf(lengths) : 0,
    emptyStrings: strings.length - present.length,
    whitespaceOnly: present.filter(s => s.trim() === '').length
  };
};

export const dateDistributions = (dates: Date[]): DateDistributions => {
  const distributions: DateDistributions = {
    dayOfWeek: countBy(dates, d => format(d, 'EEEE')),
    month: countBy(dates, d => format(d, 'MMMM')),
    year: countBy(dates, d => String(getYear(d)))
  };
  // date-only columns all land on midnight
  if (new Set(dates.map(d => getHours(d))).size > 1) {
    distributions.hour = countBy(dates, d => String(getHours(d)));
  }
  return distributions;
};

export const dateStats = (dates: Date[]): DateStats | undefined => {
  if (!dates.length) return undefined;
  const times = dates.map(d => d.getTime());
  const earliest = new Date(minOf(times));
  const latest = new Date(maxOf(times));
  return {
    earliest: earliest.toISOString(),
    latest: latest.toISOString(),
    spanDays: differenceInCalendarDays(latest, earliest),
    patterns: dateDistributions(dates)
  };
};

export const parseDates = (values: unknown[]) =>
  values.map(v => toDate(v)).filter((d): d is Date => d !== null);

export const parseNumbers = (values: unknown[]) =>
  values.map(v => toNumber(v)).filter((n): n is number => n !== null);

export const analyzeColumn = (values: unknown[]): ColumnStats => {
  const total = values.length;
  const present = values.filter(v => !isMissing(v));
  const counts = new Map<string, number>();
  present.forEach(v => {
    const key = cellKey(v);
    counts.set(key, (counts.get(key) || 0) + 1);
  });

  let mostCommonValue: string | null = null;
  let mostCommonCount = 0;
  for (const [value, count] of counts) {
    if (count > mostCommonCount) {
      mostCommonValue = value;
      mostCommonCount = count;
    }
  }

  const dataType = inferDataType(values);
  const stats: ColumnStats = {
    dataType,
    nonNullCount: present.length,
    nullCount: total - present.length,
    nullPercentage: percentage(total - present.length, total),
    uniqueCount: counts.size,
    uniquePercentage: percentage(counts.size, total),
    mostCommonValue,
    mostCommonCount
  };

  if (isNumericType(dataType)) {
    stats.numeric = numericStats(parseNumbers(present));
    return stats;
  }

  stats.text = textStats(values);
  if (isDateLike(values)) {
    stats.date = dateStats(parseDates(present));
  }
  return stats;
};
