import { CapabilityId, ColumnMapping, DomainProfile, QuestionDefinition, Tier, TierId } from '../types/schema';

export type MappedFields = ReadonlySet<string>;

export const mappedFields = (mapping: ColumnMapping): MappedFields =>
  new Set(Object.keys(mapping).filter(field => Boolean(mapping[field])));

export const tierMeetsRequirements = (tier: Tier, mapped: MappedFields) =>
  tier.fields.every(field => mapped.has(field));

/**
 * Highest tier whose required fields are all mapped. Tiers are independent
 * requirement sets, so a higher tier can be satisfied while a lower one is not.
 * With nothing satisfied the lowest tier is reported.
 */
export const achievedTier = (domain: DomainProfile, mapped: MappedFields): TierId => {
  for (let i = domain.tiers.length - 1; i >= 0; i--) {
    if (tierMeetsRequirements(domain.tiers[i], mapped)) return domain.tiers[i].id;
  }
  return domain.tiers[0].id;
};

export const capabilitiesFor = (domain: DomainProfile, tierId: TierId): CapabilityId[] =>
  domain.tiers.find(t => t.id === tierId)?.capabilities.slice() ?? [];

/** Union of capabilities over every satisfied tier, lowest tier first. */
export const unlockedCapabilities = (domain: DomainProfile, mapped: MappedFields): CapabilityId[] => {
  const unlocked = new Set<CapabilityId>();
  for (const tier of domain.tiers) {
    if (!tierMeetsRequirements(tier, mapped)) continue;
    tier.capabilities.forEach(c => unlocked.add(c));
  }
  return Array.from(unlocked);
};

export const missingFieldsForTier = (tier: Tier, mapped: MappedFields) =>
  tier.fields.filter(field => !mapped.has(field));

export type QuestionAvailability = QuestionDefinition & {
  available: boolean;
  missingFields: string[];
};

export const availableQuestions = (domain: DomainProfile, mapped: MappedFields): QuestionAvailability[] =>
  domain.questions.map(question => {
    const missingFields = question.requiredFields.filter(field => !mapped.has(field));
    return { ...question, available: missingFields.length === 0, missingFields };
  });
