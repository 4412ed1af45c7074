import type { LexicalIndex } from "./lexical-index.js";
import type { IntentKind, QueryFilters } from "./types.js";

const MAX_NEAR_MISSES = 3;
const MIN_TERM_LENGTH_FOR_NEAR_MISS = 4;
const MANY_RESULTS_THRESHOLD = 50;

export const editDistance = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
};

/** Vocabulary tokens close to query terms that the index does not know. */
export const findNearMisses = (terms: readonly string[], index: LexicalIndex): string[] => {
  const vocabulary = index.vocabulary();
  const candidates: Array<{ token: string; distance: number }> = [];

  for (const term of terms) {
    if (term.length < MIN_TERM_LENGTH_FOR_NEAR_MISS || index.postings(term).size > 0) {
      continue;
    }
    const maxDistance = term.length >= 8 ? 2 : 1;
    for (const token of vocabulary) {
      if (Math.abs(token.length - term.length) > maxDistance) {
        continue;
      }
      const distance = editDistance(term, token);
      if (distance > 0 && distance <= maxDistance) {
        candidates.push({ token, distance });
      }
    }
  }

  const unique = new Map<string, number>();
  for (const candidate of candidates) {
    const known = unique.get(candidate.token);
    if (known === undefined || candidate.distance < known) {
      unique.set(candidate.token, candidate.distance);
    }
  }

  return [...unique.entries()]
    .sort((a, b) => a[1] - b[1] || a[0].localeCompare(b[0]))
    .slice(0, MAX_NEAR_MISSES)
    .map(([token]) => token);
};

const describeFilters = (filters: QueryFilters): string =>
  Object.entries(filters)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ");

export type EmptyResultContext = {
  query: string;
  terms: readonly string[];
  filters: QueryFilters;
  matchedBeforeFilters: number;
  index: LexicalIndex;
};

export const suggestForEmptyResult = (context: EmptyResultContext): string[] => {
  const suggestions: string[] = [];

  if (context.terms.length === 0) {
    suggestions.push("Add a more specific term, such as a support item name, rule, or topic.");
    return suggestions;
  }

  const filterText = describeFilters(context.filters);
  if (context.matchedBeforeFilters > 0 && filterText) {
    suggestions.push(`No match for filters ${filterText}. Try removing a filter.`);
  }

  const nearMisses = findNearMisses(context.terms, context.index);
  if (nearMisses.length > 0) {
    suggestions.push(`Did you mean: ${nearMisses.join(", ")}?`);
  }

  if (suggestions.length === 0) {
    suggestions.push(`No documents matched "${context.query.trim()}". Try different or fewer search terms.`);
  }

  return suggestions;
};

export const suggestRefinements = (input: {
  intent: IntentKind;
  filters: QueryFilters;
  candidateCount: number;
}): string[] => {
  const suggestions: string[] = [];
  if (input.candidateCount > MANY_RESULTS_THRESHOLD) {
    suggestions.push("Try being more specific, for example by adding a category or state.");
  }
  if (input.intent === "pricing" && !input.filters.region) {
    suggestions.push("Add your state or territory to see local pricing (e.g. 'in NSW').");
  }
  return suggestions;
};
