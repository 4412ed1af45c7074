type Ranked = {
  documentId: string;
  score: number;
};

/** Score descending, then ingestion order, then id. */
export const compareRanked =
  (ordinal: (documentId: string) => number) =>
  (a: Ranked, b: Ranked): number => {
    if (b.score !== a.score) {
      return b.score - a.score;
    }
    const byOrdinal = ordinal(a.documentId) - ordinal(b.documentId);
    if (byOrdinal !== 0) {
      return byOrdinal;
    }
    return a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
  };
