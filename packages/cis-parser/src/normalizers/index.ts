import type { Recommendation, RecommendationSection } from '@cisbench/types';
import { compareControlKeys, compareControlNumbers, getSectionKey, parseControlNumber } from '@cisbench/types';

/**
 * Keep the first occurrence of every control number, in encounter order.
 */
export function deduplicateRecommendations(recommendations: Recommendation[]): Recommendation[] {
  const seen = new Set<string>();
  const result: Recommendation[] = [];

  for (const rec of recommendations) {
    if (!seen.has(rec.num)) {
      seen.add(rec.num);
      result.push(rec);
    }
  }

  return result;
}

/**
 * Sort by control number compared as integer tuples ("1.2" < "1.10").
 * Every control number is parsed up front, so a non-integer component throws
 * at any list length.
 */
export function sortRecommendations(recommendations: Recommendation[]): Recommendation[] {
  return recommendations
    .map((rec) => ({ key: parseControlNumber(rec.num), rec }))
    .sort((a, b) => compareControlKeys(a.key, b.key))
    .map(({ rec }) => rec);
}

/**
 * Partition by top-level section, sections ordered numerically and each
 * keeping the input order of its recommendations.
 */
export function groupBySection(recommendations: Recommendation[]): RecommendationSection[] {
  const groups = new Map<string, Recommendation[]>();

  for (const rec of recommendations) {
    const key = getSectionKey(rec.num);
    const existing = groups.get(key);
    if (existing !== undefined) {
      existing.push(rec);
    } else {
      groups.set(key, [rec]);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareControlNumbers(a, b))
    .map(([number, recs]) => ({ number, recommendations: recs }));
}
