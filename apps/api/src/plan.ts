import { canonicalFields, getDomain, hasDomain } from './catalog';
import { DomainScore, classifyDomain, scoreDomains } from './infer';
import {
  QuestionAvailability,
  achievedTier,
  availableQuestions,
  capabilitiesFor,
  mappedFields,
  missingFieldsForTier,
  tierMeetsRequirements,
  unlockedCapabilities
} from './map/capabilities';
import { FieldMatch, explainMapping, mappingFromMatches } from './map/columns';
import { CanonicalField, Catalog, CapabilityId, Classification, ColumnMapping, Dataset, DomainId } from './types/schema';

export type AnalysisPlan = {
  dataset: { name: string; columns: string[]; rowCount: number; source?: string };
  classification: Classification;
  scores: DomainScore[];
  domain: { id: DomainId; name: string };
  fields: CanonicalField[];
  matches: FieldMatch[];
  mapping: ColumnMapping;
  tier: { id: string; label: string; satisfied: boolean };
  capabilities: CapabilityId[];
  unlockedCapabilities: CapabilityId[];
  nextTier: { id: string; label: string; missingFields: string[] } | null;
  questions: QuestionAvailability[];
  confirmed: boolean;
};

export type PlanOptions = {
  domain?: DomainId;
  mapping?: ColumnMapping;
  threshold?: number;
};

/** Classify, map and gate a dataset in one pass. An explicit domain or mapping overrides the automatic one. */
export const buildPlan = (dataset: Dataset, catalog: Catalog, options: PlanOptions = {}): AnalysisPlan => {
  const classification = classifyDomain(dataset.columns, catalog);
  const domainId = options.domain && hasDomain(catalog, options.domain) ? options.domain : classification.domain;
  const domain = getDomain(catalog, domainId);

  const matches = explainMapping(dataset.columns, domain, catalog, { threshold: options.threshold });
  const mapping = options.mapping ?? mappingFromMatches(matches);

  const mapped = mappedFields(mapping);
  const tierId = achievedTier(domain, mapped);
  const tier = domain.tiers.find(t => t.id === tierId) ?? domain.tiers[0];
  const tierIndex = domain.tiers.indexOf(tier);
  const next = domain.tiers.slice(tierIndex + 1).find(t => !tierMeetsRequirements(t, mapped));

  return {
    dataset: { name: dataset.name, columns: dataset.columns, rowCount: dataset.rows.length, source: dataset.source },
    classification,
    scores: scoreDomains(dataset.columns, catalog),
    domain: { id: domain.id, name: domain.name },
    fields: canonicalFields(domain),
    matches,
    mapping,
    tier: { id: tier.id, label: tier.label, satisfied: tierMeetsRequirements(tier, mapped) },
    capabilities: capabilitiesFor(domain, tierId),
    unlockedCapabilities: unlockedCapabilities(domain, mapped),
    nextTier: next ? { id: next.id, label: next.label, missingFields: missingFieldsForTier(next, mapped) } : null,
    questions: availableQuestions(domain, mapped),
    confirmed: false
  };
};
