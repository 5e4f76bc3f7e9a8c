import { isPatternCategory } from '../catalog';
import { Catalog, ColumnMapping, DomainProfile } from '../types/schema';
import { compilePatterns, containsKeyword, familyKeywords } from '../utils/keywords';
import { nameSimilarity, bestFuzzyMatch } from '../utils/similarity';

export type MatchMethod = 'pattern' | 'keyword' | 'fuzzy';

export type FieldMatch = {
  field: string;
  column: string | null;
  method: MatchMethod | null;
  score: number;
};

export type MapOptions = {
  threshold?: number;
};

const firstUnclaimed = (columns: string[], claimed: Set<string>, test: (col: string) => boolean) =>
  columns.find(col => !claimed.has(col) && test(col)) ?? null;

/**
 * Walks the domain's fields in catalog order. Each field tries the domain's regex
 * family, then the shared keyword family, then fuzzy name similarity. A raw column
 * claimed by an earlier field is never reused.
 */
export const explainMapping = (
  columnNames: string[],
  domain: DomainProfile,
  catalog: Catalog,
  options: MapOptions = {}
): FieldMatch[] => {
  const threshold = options.threshold ?? catalog.settings.fuzzyMatchThreshold;
  const claimed = new Set<string>();
  const matches: FieldMatch[] = [];

  for (const field of domain.fields) {
    let match: FieldMatch = { field: field.name, column: null, method: null, score: 0 };

    const patterns = isPatternCategory(field.family) ? compilePatterns(domain.patterns[field.family]) : [];
    const byPattern = patterns.length
      ? firstUnclaimed(columnNames, claimed, col => patterns.some(p => p.test(col)))
      : null;

    if (byPattern) {
      match = { field: field.name, column: byPattern, method: 'pattern', score: nameSimilarity(field.name, byPattern) };
    } else {
      const keywords = familyKeywords(catalog, field.family);
      const byKeyword = keywords.length
        ? firstUnclaimed(columnNames, claimed, col => containsKeyword(col, keywords))
        : null;

      if (byKeyword) {
        match = { field: field.name, column: byKeyword, method: 'keyword', score: nameSimilarity(field.name, byKeyword) };
      } else {
        const available = columnNames.filter(col => !claimed.has(col));
        const fuzzy = bestFuzzyMatch(field.name, available, threshold);
        if (fuzzy) {
          match = { field: field.name, column: fuzzy.candidate, method: 'fuzzy', score: fuzzy.score };
        }
      }
    }

    if (match.column) claimed.add(match.column);
    matches.push({ ...match, score: Number(match.score.toFixed(2)) });
  }

  return matches;
};

export const mappingFromMatches = (matches: FieldMatch[]): ColumnMapping => {
  const mapping: Record<string, string> = {};
  for (const match of matches) {
    if (match.column) mapping[match.field] = match.column;
  }
  return Object.freeze(mapping);
};

export const mapColumns = (
  columnNames: string[],
  domain: DomainProfile,
  catalog: Catalog,
  options: MapOptions = {}
): ColumnMapping => mappingFromMatches(explainMapping(columnNames, domain, catalog, options));

export type MappingValidation = { ok: true; mapping: ColumnMapping } | { ok: false; errors: string[] };

/** Checks a user-supplied mapping against the domain's fields and the dataset's columns. */
export const validateMapping = (
  candidate: Record<string, unknown>,
  columnNames: string[],
  domain: DomainProfile
): MappingValidation => {
  const errors: string[] = [];
  const fields = new Set(domain.fields.map(f => f.name));
  const columns = new Set(columnNames);
  const used = new Map<string, string>();
  const mapping: Record<string, string> = {};

  for (const [field, column] of Object.entries(candidate)) {
    if (column === null || column === undefined || column === '') continue;
    if (!fields.has(field)) {
      errors.push(`Unknown field "${field}" for domain ${domain.id}`);
      continue;
    }
    if (typeof column !== 'string' || !columns.has(column)) {
      errors.push(`Column "${String(column)}" for field "${field}" is not in the dataset`);
      continue;
    }
    const previous = used.get(column);
    if (previous) {
      errors.push(`Column "${column}" is mapped to both "${previous}" and "${field}"`);
      continue;
    }
    used.set(column, field);
    mapping[field] = column;
  }

  if (errors.length) return { ok: false, errors };
  return { ok: true, mapping: Object.freeze(mapping) };
};
