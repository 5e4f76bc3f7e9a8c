import fs from 'fs';
import { fileURLToPath } from 'url';
import { Catalog, DomainProfile } from '../types/schema';
import { DEFAULT_FUZZY_THRESHOLD, DEFAULT_KEYWORD_FAMILIES, GENERAL_DOMAIN, GENERAL_DOMAIN_ID, defaultCatalog } from './defaults';
import { catalogFileSchema, domainSchema, formatZodError } from './schema';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../config/catalog.json', import.meta.url));

const warn = (warnings: string[], message: string) => {
  warnings.push(message);
  console.warn(`[catalog] ${message}`);
};

export const parseCatalog = (raw: unknown): Catalog => {
  const warnings: string[] = [];
  const file = catalogFileSchema.safeParse(raw);
  if (!file.success) {
    warn(warnings, `Malformed catalog, using default catalog (${formatZodError(file.error)})`);
    return defaultCatalog(warnings);
  }

  const domains: DomainProfile[] = [];
  file.data.domains.forEach((entry, index) => {
    const parsed = domainSchema.safeParse(entry);
    if (!parsed.success) {
      warn(warnings, `Skipped malformed domain entry #${index} (${formatZodError(parsed.error)})`);
      return;
    }
    if (domains.some(d => d.id === parsed.data.id)) {
      warn(warnings, `Skipped duplicate domain "${parsed.data.id}"`);
      return;
    }
    domains.push(parsed.data);
  });

  if (!domains.some(d => d.id === GENERAL_DOMAIN_ID)) {
    domains.push(GENERAL_DOMAIN);
  }

  return {
    version: file.data.version,
    settings: {
      fuzzyMatchThreshold: file.data.settings.fuzzyMatchThreshold ?? DEFAULT_FUZZY_THRESHOLD
    },
    keywordFamilies: { ...DEFAULT_KEYWORD_FAMILIES, ...file.data.keywordFamilies },
    domains,
    warnings
  };
};

export const loadCatalog = (filePath: string = DEFAULT_CATALOG_PATH): Catalog => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    const warnings: string[] = [];
    warn(warnings, `Could not read catalog at ${filePath}, using default catalog (${reason})`);
    return defaultCatalog(warnings);
  }
  return parseCatalog(raw);
};
