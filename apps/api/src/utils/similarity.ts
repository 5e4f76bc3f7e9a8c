import levenshtein from 'fast-levenshtein';

export const normalizeName = (name: string) =>
  name
    .toLowerCase()
    .replace(/[_\s.-]/g, '')
    .replace(/ids$/, '')
    .replace(/id$/, '')
    .trim();

export const nameSimilarity = (a: string, b: string) => {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (!na || !nb) return 0;
  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - dist / maxLen;
};

export type FuzzyMatch = { candidate: string; score: number };

/** Best candidate at or above the threshold; ties keep the earliest candidate. */
export const bestFuzzyMatch = (target: string, candidates: string[], threshold: number): FuzzyMatch | null => {
  let best: FuzzyMatch | null = null;
  for (const candidate of candidates) {
    const score = nameSimilarity(target, candidate);
    if (score < threshold) continue;
    if (!best || score > best.score) best = { candidate, score };
  }
  return best;
};
