const TOKEN_SPLIT_PATTERN = /[^a-z0-9]+/;
const MIN_TOKEN_LENGTH = 2;

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .split(TOKEN_SPLIT_PATTERN)
    .filter((token) => token.length >= MIN_TOKEN_LENGTH);

/** Distinct query terms in first-seen order, without stop words. */
export const extractQueryTerms = (query: string, stopWords: ReadonlySet<string>): string[] => {
  const terms: string[] = [];
  const seen = new Set<string>();
  for (const token of tokenize(query)) {
    if (stopWords.has(token) || seen.has(token)) {
      continue;
    }
    seen.add(token);
    terms.push(token);
  }
  return terms;
};
