import { InsightClient } from '../insights';
import { DataProfile } from '../types/profile';
import { ColumnMapping, Dataset, DomainProfile } from '../types/schema';

export type ChartType = 'bar' | 'line' | 'histogram' | 'pie';

export type ChartSpec = {
  type: ChartType;
  title: string;
  x: string;
  y: string;
  data: Array<Record<string, string | number>>;
};

export type TableData = {
  columns: string[];
  rows: Array<Record<string, string | number | null>>;
};

export type AnalysisResult = {
  summary: string;
  figure: ChartSpec | null;
  table: TableData | null;
};

export type AnalysisParams = Record<string, unknown>;

export type AnalysisContext = {
  mapping: ColumnMapping;
  domain: DomainProfile;
  params: AnalysisParams;
  insights: InsightClient;
  profile?: DataProfile;
};

export type AnalysisModule = (
  dataset: Dataset,
  context: AnalysisContext
) => Partial<AnalysisResult> | Promise<Partial<AnalysisResult>>;

export type AnalysisDefinition = {
  id: string;
  title: string;
  run: AnalysisModule;
};
