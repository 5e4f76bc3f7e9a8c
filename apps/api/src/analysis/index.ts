import { customQuestion } from './custom';
import { churnPrediction, repeatRate } from './customers';
import { avgOrderValue } from './orders';
import { bottomProducts, topProducts } from './products';
import { costProfit, returnRate } from './profit';
import { agentPerformance, salesByChannel, salesByLocation } from './segments';
import { salesTrend, seasonality } from './trends';
import { AnalysisDefinition } from './types';

export const ANALYSIS_MODULES: readonly AnalysisDefinition[] = [
  topProducts,
  bottomProducts,
  salesTrend,
  seasonality,
  avgOrderValue,
  salesByLocation,
  salesByChannel,
  agentPerformance,
  repeatRate,
  churnPrediction,
  costProfit,
  returnRate,
  customQuestion
];

export { createRegistry, createDispatcher } from './registry';
export type { AnalysisRegistry, Dispatcher } from './registry';
export type { AnalysisContext, AnalysisDefinition, AnalysisModule, AnalysisResult, ChartSpec, TableData } from './types';
