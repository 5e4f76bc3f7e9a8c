import { cellKey, isMissing, round, toNumber } from '../utils/values';
import { AnalysisDefinition } from './types';
import { columnFor, formatAmount, isTruthy, missingColumns, noData, percent, resolveColumns } from './helpers';

const LIMIT = 10;

export const costProfit: AnalysisDefinition = {
  id: 'cost_profit',
  title: 'Profit and margin',
  run: (dataset, context) => {
    const resolved = resolveColumns(context, ['cost', 'amount']);
    if (!resolved.ok) return missingColumns(resolved.missing);
    const { cost, amount } = resolved.columns;
    const product = columnFor(context, 'product');

    let revenue = 0;
    let spend = 0;
    const perProduct = new Map<string, number>();
    for (const row of dataset.rows) {
      const sale = toNumber(row[amount]);
      const outlay = toNumber(row[cost]);
      if (sale === null || outlay === null) continue;
      revenue += sale;
      spend += outlay;
      if (product && !isMissing(row[product.column])) {
        const key = cellKey(row[product.column]);
        perProduct.set(key, (perProduct.get(key) || 0) + sale - outlay);
      }
    }
    if (!revenue && !spend) return noData(`${cost} and ${amount}`);

    const profit = round(revenue - spend);
    const margin = percent(profit, revenue);
    const summary = `Profit is ${formatAmount(profit)} on ${formatAmount(round(revenue))} of revenue, a ${margin}% margin.`;

    if (!product || !perProduct.size) {
      return {
        summary,
        table: {
          columns: ['metric', 'value'],
          rows: [
            { metric: 'Revenue', value: round(revenue) },
            { metric: 'Cost', value: round(spend) },
            { metric: 'Profit', value: profit },
            { metric: 'Margin %', value: margin }
          ]
        }
      };
    }

    const ranked = Array.from(perProduct.entries())
      .map(([key, value]) => ({ product: key, profit: round(value) }))
      .sort((a, b) => b.profit - a.profit)
      .slice(0, LIMIT);
    return {
      summary: `${summary} ${ranked[0].product} contributes the most profit.`,
      figure: { type: 'bar', title: 'Profit by product', x: 'product', y: 'profit', data: ranked },
      table: { columns: ['product', 'profit'], rows: ranked }
    };
  }
};

export const returnRate: AnalysisDefinition = {
  id: 'return_rate',
  title: 'Return rate',
  run: (dataset, context) => {
    const returned = columnFor(context, 'returned');
    if (!returned) return missingColumns(['returned']);
    const group = columnFor(context, 'product') ?? columnFor(context, 'category');

    let total = 0;
    let returnedCount = 0;
    const perGroup = new Map<string, { returned: number; count: number }>();
    for (const row of dataset.rows) {
      const value = row[returned.column];
      if (isMissing(value)) continue;
      const isReturned = isTruthy(value);
      total++;
      if (isReturned) returnedCount++;
      if (group && !isMissing(row[group.column])) {
        const key = cellKey(row[group.column]);
        const entry = perGroup.get(key) ?? { returned: 0, count: 0 };
        entry.count++;
        if (isReturned) entry.returned++;
        perGroup.set(key, entry);
      }
    }
    if (!total) return noData(returned.column);

    const overall = percent(returnedCount, total);
    const summary = `${overall}% of orders (${returnedCount} of ${total}) were returned.`;
    if (!group || !perGroup.size) return { summary };

    const ranked = Array.from(perGroup.entries())
      .map(([key, entry]) => ({ key, returned: entry.returned, orders: entry.count, rate: percent(entry.returned, entry.count) }))
      .sort((a, b) => b.rate - a.rate)
      .slice(0, LIMIT);
    const rows = ranked.map(r => ({ [group.column]: r.key, returned: r.returned, orders: r.orders, rate: r.rate }));
    return {
      summary: `${summary} ${ranked[0].key} has the highest return rate at ${ranked[0].rate}%.`,
      figure: {
        type: 'bar',
        title: `Return rate by ${group.column}`,
        x: group.column,
        y: 'rate',
        data: rows
      },
      table: { columns: [group.column, 'returned', 'orders', 'rate'], rows }
    };
  }
};
