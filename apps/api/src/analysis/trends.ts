import { format } from 'date-fns';
import { round } from '../utils/values';
import { AnalysisDefinition } from './types';
import { datedAmounts, formatAmount, missingColumns, noData, percent, resolveColumns } from './helpers';

const MONTHS_SHOWN = 12;
const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December'
];

export const salesTrend: AnalysisDefinition = {
  id: 'sales_trend',
  title: 'Monthly sales trend',
  run: (dataset, context) => {
    const resolved = resolveColumns(context, ['date', 'amount']);
    if (!resolved.ok) return missingColumns(resolved.missing);
    const { date, amount } = resolved.columns;

    const points = datedAmounts(dataset, date, amount);
    if (!points.length) return noData(`${date} and ${amount}`);

    const monthly = new Map<string, number>();
    points.forEach(p => {
      const key = format(p.date, 'yyyy-MM');
      monthly.set(key, (monthly.get(key) || 0) + p.amount);
    });
    const series = Array.from(monthly.entries())
      .sort(([a], [b]) => (a < b ? -1 : 1))
      .slice(-MONTHS_SHOWN)
      .map(([month, total]) => ({ month, total: round(total) }));

    const latest = series[series.length - 1];
    const previous = series.length > 1 ? series[series.length - 2] : null;
    let summary = `Sales in ${latest.month} were ${formatAmount(latest.total)}.`;
    if (previous && previous.total) {
      const change = round(((latest.total - previous.total) / previous.total) * 100, 1);
      summary += ` That is ${change >= 0 ? 'up' : 'down'} ${Math.abs(change)}% from ${previous.month}.`;
    }

    return {
      summary,
      figure: { type: 'line', title: 'Monthly sales', x: 'month', y: 'total', data: series },
      table: { columns: ['month', 'total'], rows: series }
    };
  }
};

export const seasonality: AnalysisDefinition = {
  id: 'seasonality',
  title: 'Sales by calendar month',
  run: (dataset, context) => {
    const resolved = resolveColumns(context, ['date', 'amount']);
    if (!resolved.ok) return missingColumns(resolved.missing);
    const { date, amount } = resolved.columns;

    const points = datedAmounts(dataset, date, amount);
    if (!points.length) return noData(`${date} and ${amount}`);

    const totals = new Array<number>(12).fill(0);
    points.forEach(p => {
      totals[p.date.getMonth()] += p.amount;
    });
    const series = totals
      .map((total, index) => ({ month: MONTH_NAMES[index], total: round(total) }))
      .filter(m => m.total !== 0);
    if (!series.length) return noData(`${date} and ${amount}`);

    const grandTotal = series.reduce((acc, m) => acc + m.total, 0);
    const peak = series.reduce((best, m) => (m.total > best.total ? m : best), series[0]);
    return {
      summary: `${peak.month} is the strongest month with ${formatAmount(peak.total)} in sales, ${percent(peak.total, grandTotal)}% of the yearly total.`,
      figure: { type: 'bar', title: 'Sales by month of year', x: 'month', y: 'total', data: series },
      table: { columns: ['month', 'total'], rows: series }
    };
  }
};
