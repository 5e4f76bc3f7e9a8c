import { profileContext } from '../profile';
import { Dataset } from '../types/schema';
import { inferDataType, isNumericType } from '../utils/profile';
import { isMissing, mean, round, sum, toNumber } from '../utils/values';
import { AnalysisContext, AnalysisDefinition, AnalysisResult, TableData } from './types';
import { columnFor } from './helpers';

const MAX_NUMERIC_COLUMNS = 5;

type NumericSummary = { column: string; total: number; average: number; filled: number };

const numericSummary = (dataset: Dataset): NumericSummary[] =>
  dataset.columns
    .filter(col => isNumericType(inferDataType(dataset.rows.map(row => row[col]))))
    .slice(0, MAX_NUMERIC_COLUMNS)
    .map(column => {
      const values = dataset.rows.map(row => toNumber(row[column])).filter((v): v is number => v !== null);
      return { column, total: round(sum(values)), average: round(mean(values)), filled: values.length };
    });

const questionText = (questionId: string, context: AnalysisContext) => {
  const { question } = context.params;
  return typeof question === 'string' && question.trim() ? question.trim() : questionId.replace(/_/g, ' ');
};

/**
 * Structural summary of the dataset plus whatever mapped columns are available,
 * and the data profile when the caller has one, handed to the insight client. Answers any question id, registered or not.
 */
export const answerCustomQuestion = async (
  questionId: string,
  dataset: Dataset,
  context: AnalysisContext
): Promise<AnalysisResult> => {
  const numeric = numericSummary(dataset);
  const mappedColumns = Object.fromEntries(Object.entries(context.mapping).filter(([, column]) => Boolean(column)));
  const amount = columnFor(context, 'amount');

  const payload = {
    question: questionText(questionId, context),
    rows: dataset.rows.length,
    columns: dataset.columns.length,
    columnNames: dataset.columns,
    mappedColumns,
    emptyCells: dataset.rows.reduce((acc, row) => acc + dataset.columns.filter(col => isMissing(row[col])).length, 0),
    numericSummary: Object.fromEntries(numeric.map(n => [n.column, { total: n.total, average: n.average }])),
    ...(amount ? { amountColumn: amount.column } : {}),
    ...(context.profile ? { profile: profileContext(context.profile) } : {})
  };

  const text = await context.insights.generate(payload, context.domain.id, 'custom_analysis');
  const table: TableData | null = numeric.length
    ? {
        columns: ['column', 'total', 'average', 'filled'],
        rows: numeric.map(n => ({ column: n.column, total: n.total, average: n.average, filled: n.filled }))
      }
    : null;

  return { summary: text, figure: null, table };
};

export const customQuestion: AnalysisDefinition = {
  id: 'custom_question',
  title: 'Ask your own question',
  run: (dataset, context) => answerCustomQuestion('custom_question', dataset, context)
};
