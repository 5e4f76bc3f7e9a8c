import { differenceInCalendarDays, format } from 'date-fns';
import { cellKey, isMissing, toDate } from '../utils/values';
import { AnalysisDefinition } from './types';
import { columnFor, missingColumns, noData, percent, resolveColumns } from './helpers';

const TABLE_LIMIT = 30;
const LAPSE_DAYS = 90;

const RECENCY_BUCKETS: Array<{ label: string; upTo: number }> = [
  { label: '0-30 days', upTo: 30 },
  { label: '31-90 days', upTo: 90 },
  { label: '91-180 days', upTo: 180 },
  { label: '181-365 days', upTo: 365 },
  { label: 'over a year', upTo: Infinity }
];

export const repeatRate: AnalysisDefinition = {
  id: 'repeat_rate',
  title: 'Repeat customers',
  run: (dataset, context) => {
    const customer = columnFor(context, 'customer');
    if (!customer) return missingColumns(['customer']);

    const orders = new Map<string, number>();
    dataset.rows.forEach(row => {
      const value = row[customer.column];
      if (isMissing(value)) return;
      orders.set(cellKey(value), (orders.get(cellKey(value)) || 0) + 1);
    });
    if (!orders.size) return noData(customer.column);

    const repeaters = Array.from(orders.values()).filter(n => n > 1).length;
    const rate = percent(repeaters, orders.size);

    const frequency = new Map<number, number>();
    orders.forEach(n => frequency.set(n, (frequency.get(n) || 0) + 1));
    const distribution = Array.from(frequency.entries())
      .sort(([a], [b]) => a - b)
      .map(([ordersPlaced, customers]) => ({ orders: ordersPlaced, customers }));

    const ranked = Array.from(orders.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, TABLE_LIMIT);

    return {
      summary: `${rate}% of customers (${repeaters} of ${orders.size}) placed more than one order.`,
      figure: { type: 'bar', title: 'Orders per customer', x: 'orders', y: 'customers', data: distribution },
      table: {
        columns: [customer.column, 'Orders'],
        rows: ranked.map(([id, count]) => ({ [customer.column]: id, Orders: count }))
      }
    };
  }
};

type CustomerActivity = { id: string; last: Date; orders: number };

// Recency is measured from the latest date in the data, not from today.
export const churnPrediction: AnalysisDefinition = {
  id: 'churn_prediction',
  title: 'Customers at risk of leaving',
  run: (dataset, context) => {
    const resolved = resolveColumns(context, ['customer', 'date']);
    if (!resolved.ok) return missingColumns(resolved.missing);
    const { customer, date } = resolved.columns;

    const activity = new Map<string, CustomerActivity>();
    for (const row of dataset.rows) {
      const id = row[customer];
      const when = toDate(row[date]);
      if (isMissing(id) || !when) continue;
      const key = cellKey(id);
      const entry = activity.get(key);
      if (!entry) {
        activity.set(key, { id: key, last: when, orders: 1 });
        continue;
      }
      entry.orders++;
      if (when > entry.last) entry.last = when;
    }
    if (!activity.size) return noData(`${customer} and ${date}`);

    const customers = Array.from(activity.values());
    const reference = customers.reduce((latest, c) => (c.last > latest ? c.last : latest), customers[0].last);
    const recency = customers
      .map(c => ({ ...c, days: differenceInCalendarDays(reference, c.last) }))
      .sort((a, b) => b.days - a.days);
    const lapsed = recency.filter(c => c.days > LAPSE_DAYS);

    const lines = [
      `${percent(lapsed.length, customers.length)}% of customers (${lapsed.length} of ${customers.length}) have not bought in the ${LAPSE_DAYS} days up to ${format(reference, 'yyyy-MM-dd')}.`
    ];
    if (lapsed.length) {
      lines.push(`${lapsed[0].id} has been away the longest, ${lapsed[0].days} days since the last purchase.`);
    }

    const buckets = RECENCY_BUCKETS.map(bucket => ({ recency: bucket.label, customers: 0 }));
    recency.forEach(c => {
      const index = RECENCY_BUCKETS.findIndex(bucket => c.days <= bucket.upTo);
      buckets[index].customers++;
    });

    return {
      summary: lines.join(' '),
      figure: {
        type: 'bar',
        title: 'Days since last purchase',
        x: 'recency',
        y: 'customers',
        data: buckets.filter(b => b.customers > 0)
      },
      table: {
        columns: [customer, 'Last purchase', 'Days since', 'Orders'],
        rows: lapsed.slice(0, TABLE_LIMIT).map(c => ({
          [customer]: c.id,
          'Last purchase': format(c.last, 'yyyy-MM-dd'),
          'Days since': c.days,
          Orders: c.orders
        }))
      }
    };
  }
};
