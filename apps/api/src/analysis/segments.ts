import { AnalysisDefinition, AnalysisModule } from './types';
import { formatAmount, groupTable, missingColumns, noData, percent, resolveColumns, sumBy } from './helpers';

const salesBy = (family: string, label: string, limit: number | null, chart: 'bar' | 'pie'): AnalysisModule =>
  (dataset, context) => {
    const resolved = resolveColumns(context, [family, 'amount']);
    if (!resolved.ok) return missingColumns(resolved.missing);
    const segment = resolved.columns[family];
    const amount = resolved.columns.amount;

    const groups = sumBy(dataset, segment, amount).sort((a, b) => b.total - a.total);
    if (!groups.length) return noData(`${segment} and ${amount}`);

    const grandTotal = groups.reduce((acc, g) => acc + g.total, 0);
    const shown = limit ? groups.slice(0, limit) : groups;
    const leader = shown[0];
    return {
      summary: `${leader.key} is the leading ${label} with ${formatAmount(leader.total)} in sales, ${percent(leader.total, grandTotal)}% of the total across ${groups.length} ${label}s.`,
      figure: {
        type: chart,
        title: `Sales by ${label}`,
        x: label,
        y: 'sales',
        data: shown.map(g => ({ [label]: g.key, sales: g.total }))
      },
      table: groupTable(shown, segment, 'Total Sales')
    };
  };

export const salesByLocation: AnalysisDefinition = {
  id: 'sales_by_location',
  title: 'Top locations by sales',
  run: salesBy('location', 'location', 5, 'bar')
};

export const salesByChannel: AnalysisDefinition = {
  id: 'sales_by_channel',
  title: 'Sales by channel',
  run: salesBy('channel', 'channel', null, 'pie')
};

export const agentPerformance: AnalysisDefinition = {
  id: 'agent_performance',
  title: 'Agent performance',
  run: salesBy('agent', 'agent', 10, 'bar')
};
