import { ColumnStats, QualityAssessment } from '../types/profile';
import { Dataset } from '../types/schema';
import { cellKey, round } from '../utils/values';

export const QUALITY_RULES = {
  missing: { threshold: 10, penalty: 20, recommendation: 'Consider imputation strategies for missing values' },
  duplicates: { threshold: 5, penalty: 15, recommendation: 'Review and remove duplicate records if appropriate' },
  outliers: { threshold: 5, penalty: 10, recommendation: 'Investigate outliers for data quality issues' }
} as const;

export const countDuplicateRows = (dataset: Dataset) => {
  const seen = new Set<string>();
  let duplicates = 0;
  for (const row of dataset.rows) {
    const key = JSON.stringify(dataset.columns.map(col => (row[col] === undefined ? null : cellKey(row[col]))));
    if (seen.has(key)) duplicates++;
    else seen.add(key);
  }
  return duplicates;
};

export const assessQuality = (dataset: Dataset, columns: Record<string, ColumnStats>): QualityAssessment => {
  const rowCount = dataset.rows.length;
  const cellCount = rowCount * dataset.columns.length;
  const nullCells = Object.values(columns).reduce((acc, stats) => acc + stats.nullCount, 0);
  const missingPercentage = cellCount ? (nullCells / cellCount) * 100 : 0;
  const duplicatePercentage = rowCount ? (countDuplicateRows(dataset) / rowCount) * 100 : 0;

  const outlierColumns = Object.values(columns).filter(stats => {
    if (!stats.numeric || !rowCount) return false;
    return (stats.numeric.outliersCount / rowCount) * 100 > QUALITY_RULES.outliers.threshold;
  }).length;

  let score = 100;
  const issues: string[] = [];
  const recommendations: string[] = [];

  if (missingPercentage > QUALITY_RULES.missing.threshold) {
    score -= QUALITY_RULES.missing.penalty;
    issues.push(`High missing values: ${missingPercentage.toFixed(1)}%`);
    recommendations.push(QUALITY_RULES.missing.recommendation);
  }
  if (duplicatePercentage > QUALITY_RULES.duplicates.threshold) {
    score -= QUALITY_RULES.duplicates.penalty;
    issues.push(`Duplicate rows: ${duplicatePercentage.toFixed(1)}%`);
    recommendations.push(QUALITY_RULES.duplicates.recommendation);
  }
  if (outlierColumns > 0) {
    score -= QUALITY_RULES.outliers.penalty;
    issues.push(`Outliers detected in ${outlierColumns} numeric column(s)`);
    recommendations.push(QUALITY_RULES.outliers.recommendation);
  }

  return {
    score: Math.max(0, score),
    issues,
    recommendations,
    missingPercentage: round(missingPercentage),
    duplicatePercentage: round(duplicatePercentage)
  };
};
