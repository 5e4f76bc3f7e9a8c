import { maxOf, mean, median, minOf, round, toNumber } from '../utils/values';
import { AnalysisDefinition } from './types';
import { columnFor, formatAmount, missingColumns, noData, sumBy } from './helpers';

const BINS = 10;

const histogram = (values: number[]) => {
  const min = minOf(values);
  const max = maxOf(values);
  const width = (max - min) / BINS || 1;
  const counts = new Array<number>(BINS).fill(0);
  values.forEach(v => {
    counts[Math.min(BINS - 1, Math.floor((v - min) / width))]++;
  });
  return counts
    .map((count, i) => ({ range: `${formatAmount(min + i * width)} - ${formatAmount(min + (i + 1) * width)}`, count }))
    .filter(bin => bin.count > 0);
};

// One order per row unless an order id is mapped, in which case rows are summed per order.
export const avgOrderValue: AnalysisDefinition = {
  id: 'avg_order_value',
  title: 'Average order value',
  run: (dataset, context) => {
    const amount = columnFor(context, 'amount');
    if (!amount) return missingColumns(['amount']);
    const order = columnFor(context, 'order');

    const values = order
      ? sumBy(dataset, order.column, amount.column).map(g => g.total)
      : dataset.rows.map(row => toNumber(row[amount.column])).filter((v): v is number => v !== null);
    if (!values.length) return noData(amount.column);

    const avg = round(mean(values));
    const mid = round(median(values));
    const unit = order ? 'orders' : 'transactions';
    return {
      summary: `Average order value is ${formatAmount(avg)} across ${values.length} ${unit} (median ${formatAmount(mid)}).`,
      figure: { type: 'histogram', title: 'Order value distribution', x: 'range', y: 'count', data: histogram(values) },
      table: {
        columns: ['metric', 'value'],
        rows: [
          { metric: 'Average', value: avg },
          { metric: 'Median', value: mid },
          { metric: 'Largest', value: maxOf(values) },
          { metric: 'Smallest', value: minOf(values) },
          { metric: unit, value: values.length }
        ]
      }
    };
  }
};
