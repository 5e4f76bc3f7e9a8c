import { InsightClient } from '../insights';
import { DataProfile } from '../types/profile';
import { ColumnMapping, Dataset, DomainProfile } from '../types/schema';
import { answerCustomQuestion } from './custom';
import { AnalysisContext, AnalysisDefinition, AnalysisParams, AnalysisResult } from './types';

export type AnalysisRegistry = ReadonlyMap<string, AnalysisDefinition>;

/** Built once from an explicit list; a repeated id is a programming error. */
export const createRegistry = (definitions: readonly AnalysisDefinition[]): AnalysisRegistry => {
  const registry = new Map<string, AnalysisDefinition>();
  for (const definition of definitions) {
    if (registry.has(definition.id)) {
      throw new Error(`Duplicate analysis module id: ${definition.id}`);
    }
    registry.set(definition.id, definition);
  }
  return registry;
};

const normalize = (questionId: string, result: Partial<AnalysisResult>): AnalysisResult => ({
  summary: result.summary?.trim() ? result.summary : `Analysis "${questionId}" finished without a summary.`,
  figure: result.figure ?? null,
  table: result.table ?? null
});

export type Dispatcher = {
  dispatch: (
    questionId: string,
    dataset: Dataset,
    mapping: ColumnMapping,
    domain: DomainProfile,
    extraParams?: AnalysisParams,
    profile?: DataProfile
  ) => Promise<AnalysisResult>;
  has: (questionId: string) => boolean;
  ids: () => string[];
};

export const createDispatcher = (registry: AnalysisRegistry, insights: InsightClient): Dispatcher => {
  return {
    dispatch: async (questionId, dataset, mapping, domain, extraParams = {}, profile) => {
      const context: AnalysisContext = { mapping, domain, params: extraParams, insights, profile };
      const definition = registry.get(questionId);

      if (definition) {
        try {
          return normalize(questionId, await definition.run(dataset, context));
        } catch (err: unknown) {
          const reason = err instanceof Error ? err.message : String(err);
          console.warn(`[analysis] ${questionId} failed, answering as a custom question: ${reason}`);
        }
      }

      return normalize(questionId, await answerCustomQuestion(questionId, dataset, context));
    },
    has: questionId => registry.has(questionId),
    ids: () => Array.from(registry.keys())
  };
};
