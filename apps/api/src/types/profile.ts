import { DataType, DomainId } from './schema';

export type Quartiles = { q1: number; q2: number; q3: number };

export type NumericStats = {
  min: number;
  max: number;
  mean: number;
  median: number;
  std: number | null; // null with fewer than two values
  quartiles: Quartiles;
  outliersCount: number;
  zeroCount: number;
  negativeCount: number;
};

export type TextStats = {
  avgLength: number;
  minLength: number;
  maxLength: number;
  emptyStrings: number;
  whitespaceOnly: number;
};

export type DateDistributions = {
  dayOfWeek: Record<string, number>;
  month: Record<string, number>;
  year: Record<string, number>;
  hour?: Record<string, number>;
};

export type DateStats = {
  earliest: string;
  latest: string;
  spanDays: number;
  patterns: DateDistributions;
};

export type ColumnStats = {
  dataType: DataType;
  nonNullCount: number;
  nullCount: number;
  nullPercentage: number;
  uniqueCount: number;
  uniquePercentage: number;
  mostCommonValue: string | null;
  mostCommonCount: number;
  numeric?: NumericStats;
  text?: TextStats;
  date?: DateStats;
};

export type QualityAssessment = {
  score: number; // 0..100
  issues: string[];
  recommendations: string[];
  missingPercentage: number;
  duplicatePercentage: number;
};

export type BusinessInsights = {
  keyMetrics: {
    amountColumn?: string;
    totalRevenue?: number;
    avgTransaction?: number;
    maxTransaction?: number;
    minTransaction?: number;
    customerColumn?: string;
    uniqueCustomers?: number;
    repeatCustomers?: number;
  };
  trends: {
    dateColumn?: string;
    dateRange?: { start: string; end: string; spanDays: number };
    monthlyDistribution?: Record<string, number>;
  };
};

export type CategoricalPattern = {
  distribution: Record<string, number>;
  dominantCategory: string | null;
};

export type DataPatterns = {
  temporal: Record<string, DateDistributions>;
  categorical: Record<string, CategoricalPattern>;
};

export type Correlation = {
  column1: string;
  column2: string;
  correlation: number;
};

export type DataProfile = {
  fingerprint: string;
  metadata: {
    businessType: DomainId;
    totalRows: number;
    totalColumns: number;
    columnNames: string[];
    dataTypes: Record<string, DataType>;
  };
  columnAnalysis: Record<string, ColumnStats>;
  quality: QualityAssessment;
  businessInsights: BusinessInsights;
  quickFacts: string[];
  patterns: DataPatterns;
  relationships: { strongCorrelations: Correlation[] };
  timestamp: string;
};
