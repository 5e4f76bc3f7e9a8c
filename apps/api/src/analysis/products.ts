import { AnalysisDefinition } from './types';
import { formatAmount, groupTable, missingColumns, noData, percent, resolveColumns, sumBy } from './helpers';

const LIMIT = 10;

export const topProducts: AnalysisDefinition = {
  id: 'top_products',
  title: 'Top products by revenue',
  run: async (dataset, context) => {
    const resolved = resolveColumns(context, ['product', 'amount']);
    if (!resolved.ok) return missingColumns(resolved.missing);
    const { product, amount } = resolved.columns;

    const groups = sumBy(dataset, product, amount).filter(g => g.total > 0);
    if (!groups.length) return noData(`${product} and ${amount}`);

    const grandTotal = groups.reduce((acc, g) => acc + g.total, 0);
    const top = groups.sort((a, b) => b.total - a.total).slice(0, LIMIT);
    const leader = top[0];

    const insight = await context.insights.generate(
      {
        analysis: 'top_products',
        topProducts: Object.fromEntries(top.map(g => [g.key, g.total])),
        totalRevenue: grandTotal,
        productCount: groups.length,
        leaderShare: percent(leader.total, grandTotal)
      },
      context.domain.id,
      'business_insights'
    );

    const lines = [
      `${leader.key} leads with ${formatAmount(leader.total)} in revenue, ${percent(leader.total, grandTotal)}% of the total across ${groups.length} products.`,
      '',
      insight
    ];

    return {
      summary: lines.join('\n'),
      figure: {
        type: 'bar',
        title: `Top ${top.length} products by revenue`,
        x: 'product',
        y: 'revenue',
        data: top.map(g => ({ product: g.key, revenue: g.total }))
      },
      table: groupTable(top, product, 'Total Revenue')
    };
  }
};

export const bottomProducts: AnalysisDefinition = {
  id: 'bottom_products',
  title: 'Lowest selling products',
  run: (dataset, context) => {
    const resolved = resolveColumns(context, ['product', 'amount']);
    if (!resolved.ok) return missingColumns(resolved.missing);
    const { product, amount } = resolved.columns;

    const groups = sumBy(dataset, product, amount);
    if (!groups.length) return noData(`${product} and ${amount}`);

    const bottom = groups.sort((a, b) => a.total - b.total).slice(0, LIMIT);
    const last = bottom[0];
    return {
      summary: `${last.key} brings in the least, ${formatAmount(last.total)} over ${last.count} sale(s). Review whether the ${bottom.length} lowest products are worth keeping in the range.`,
      figure: {
        type: 'bar',
        title: `Bottom ${bottom.length} products by revenue`,
        x: 'product',
        y: 'revenue',
        data: bottom.map(g => ({ product: g.key, revenue: g.total }))
      },
      table: groupTable(bottom, product, 'Total Revenue')
    };
  }
};
