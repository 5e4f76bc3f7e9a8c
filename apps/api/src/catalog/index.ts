import { CanonicalField, Catalog, DomainId, DomainProfile, PatternCategory } from '../types/schema';
import { GENERAL_DOMAIN, GENERAL_DOMAIN_ID } from './defaults';

export { loadCatalog, parseCatalog, DEFAULT_CATALOG_PATH } from './load';
export { GENERAL_DOMAIN_ID, defaultCatalog } from './defaults';

export const UNTIERED = 'untiered';

export const getDomain = (catalog: Catalog, id: DomainId): DomainProfile =>
  catalog.domains.find(d => d.id === id) ??
  catalog.domains.find(d => d.id === GENERAL_DOMAIN_ID) ??
  GENERAL_DOMAIN;

export const hasDomain = (catalog: Catalog, id: DomainId) => catalog.domains.some(d => d.id === id);

/** Each field is attributed to the lowest tier that requires it. */
export const canonicalFields = (domain: DomainProfile): CanonicalField[] =>
  domain.fields.map(field => {
    const tier = domain.tiers.find(t => t.fields.includes(field.name));
    return Object.freeze({ name: field.name, domain: domain.id, tier: tier?.id ?? UNTIERED });
  });

export const familyOf = (domain: DomainProfile, fieldName: string) =>
  domain.fields.find(f => f.name === fieldName)?.family;

/** Field families double as classifier categories for date/amount/customer/location. */
export const isPatternCategory = (family?: string): family is PatternCategory =>
  family === 'date' || family === 'amount' || family === 'customer' || family === 'location';
