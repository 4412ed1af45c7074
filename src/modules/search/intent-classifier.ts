import type { Framework, IntentKind, QueryFilters, QueryIntent } from "./types.js";
import { getDefaultVocabulary, type QueryVocabulary } from "./vocabulary.js";

type PhraseMatcher = {
  phrase: string;
  pattern: RegExp;
  caseSensitive: boolean;
};

/** The query with whitespace collapsed, as typed and lowercased. */
type QueryText = {
  raw: string;
  lower: string;
};

type IntentRule = {
  intent: Exclude<IntentKind, "general">;
  matchers: PhraseMatcher[];
};

type VocabularyEntry<T> = {
  value: T;
  matchers: PhraseMatcher[];
};

type EntryMatch<T> = {
  value: T;
  position: number;
  length: number;
};

export interface IntentClassifier {
  classify(query: string): QueryIntent;
  readonly stopWords: ReadonlySet<string>;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

const normalizeQuery = (value: string): string => collapseWhitespace(value).toLowerCase();

/** Word-bounded wherever the phrase starts or ends with an alphanumeric. */
const toMatcher = (rawPhrase: string, caseSensitive = false): PhraseMatcher => {
  const phrase = caseSensitive ? collapseWhitespace(rawPhrase) : normalizeQuery(rawPhrase);
  const prefix = /^[A-Za-z0-9]/.test(phrase) ? "(?<![A-Za-z0-9])" : "";
  const suffix = /[A-Za-z0-9]$/.test(phrase) ? "(?![A-Za-z0-9])" : "";
  return {
    phrase,
    pattern: new RegExp(`${prefix}${escapeRegExp(phrase)}${suffix}`),
    caseSensitive
  };
};

const execMatcher = (matcher: PhraseMatcher, text: QueryText): RegExpExecArray | null =>
  matcher.pattern.exec(matcher.caseSensitive ? text.raw : text.lower);

const findEarliest = <T>(text: QueryText, entries: VocabularyEntry<T>[]): EntryMatch<T> | undefined => {
  let best: EntryMatch<T> | undefined;
  for (const entry of entries) {
    for (const matcher of entry.matchers) {
      const match = execMatcher(matcher, text);
      if (!match) {
        continue;
      }
      const candidate = { value: entry.value, position: match.index, length: matcher.phrase.length };
      if (
        !best ||
        candidate.position < best.position ||
        (candidate.position === best.position && candidate.length > best.length)
      ) {
        best = candidate;
      }
    }
  }
  return best;
};

const findLongest = <T>(text: QueryText, entries: VocabularyEntry<T>[]): EntryMatch<T> | undefined => {
  let best: EntryMatch<T> | undefined;
  for (const entry of entries) {
    for (const matcher of entry.matchers) {
      const match = execMatcher(matcher, text);
      if (!match) {
        continue;
      }
      const candidate = { value: entry.value, position: match.index, length: matcher.phrase.length };
      if (
        !best ||
        candidate.length > best.length ||
        (candidate.length === best.length && candidate.position < best.position)
      ) {
        best = candidate;
      }
    }
  }
  return best;
};

/**
 * Builds a classifier from a phrase table. Intent rules are evaluated in
 * table order and the first rule with a matching phrase wins; filters are
 * extracted independently of the intent.
 */
export const createIntentClassifier = (vocabulary: QueryVocabulary): IntentClassifier => {
  const rules: IntentRule[] = vocabulary.intents.map((rule) => ({
    intent: rule.intent,
    matchers: rule.phrases.map((phrase) => toMatcher(phrase))
  }));
  const regions: VocabularyEntry<string>[] = vocabulary.regions.map((region) => ({
    value: region.code,
    matchers: [toMatcher(region.code, region.codeCaseSensitive), ...region.names.map((name) => toMatcher(name))]
  }));
  const categories: VocabularyEntry<string>[] = vocabulary.categories.map((category) => ({
    value: category.name,
    matchers: [category.name, ...category.aliases].map((phrase) => toMatcher(phrase))
  }));
  const frameworks: VocabularyEntry<Framework>[] = vocabulary.frameworks.map((framework) => ({
    value: framework.framework,
    matchers: framework.phrases.map((phrase) => toMatcher(phrase))
  }));
  const stopWords: ReadonlySet<string> = new Set(vocabulary.stopWords.map((word) => word.toLowerCase()));

  const classify = (query: string): QueryIntent => {
    const raw = collapseWhitespace(query ?? "");
    const text: QueryText = { raw, lower: raw.toLowerCase() };
    const normalized = text.lower;
    const filters: QueryFilters = {};
    if (!normalized) {
      return { kind: "general", filters };
    }

    const region = findEarliest(text, regions);
    if (region) {
      filters.region = region.value;
    }
    const category = findLongest(text, categories);
    if (category) {
      filters.category = category.value;
    }
    const framework = findEarliest(text, frameworks);
    if (framework) {
      filters.framework = framework.value;
    }

    for (const rule of rules) {
      const matched = rule.matchers.find((matcher) => matcher.pattern.test(normalized));
      if (matched) {
        return { kind: rule.intent, matchedPhrase: matched.phrase, filters };
      }
    }

    return { kind: "general", filters };
  };

  return { classify, stopWords };
};

let defaultClassifier: IntentClassifier | null = null;

const getDefaultClassifier = (): IntentClassifier => {
  if (!defaultClassifier) {
    defaultClassifier = createIntentClassifier(getDefaultVocabulary());
  }
  return defaultClassifier;
};

export const classify = (query: string): QueryIntent => getDefaultClassifier().classify(query);
