import type { SourceKind } from "../corpus/types.js";
import type { RetrievalResult } from "../search/types.js";

export type Citation = {
  label: string;
  documentId: string;
  sourceKind: SourceKind;
  title?: string;
  itemNumber?: string;
  score: number;
};

export const citationLabel = (position: number): string => `Document ${position}`;

const readString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim().length > 0 ? value : undefined;

/** One citation per included result, labelled in inclusion order starting at 1. */
export const buildCitations = (included: readonly RetrievalResult[]): Citation[] =>
  included.map((result, index) => ({
    label: citationLabel(index + 1),
    documentId: result.document.id,
    sourceKind: result.document.sourceKind,
    title: readString(result.document.metadata.title),
    itemNumber: readString(result.document.metadata.itemNumber),
    score: result.score
  }));

const CITED_LABEL_PATTERN = /\bDocument\s+(\d+)\b/gi;

/** Splits the `Document N` labels an answer mentions into known and unknown ones. */
export const resolveCitedLabels = (
  answer: string,
  citations: readonly Citation[]
): { cited: Citation[]; unresolvedLabels: string[] } => {
  const byLabel = new Map(citations.map((citation) => [citation.label, citation]));
  const cited: Citation[] = [];
  const unresolvedLabels: string[] = [];
  const seen = new Set<string>();

  for (const match of answer.matchAll(CITED_LABEL_PATTERN)) {
    const label = citationLabel(Number.parseInt(match[1] ?? "", 10));
    if (seen.has(label)) {
      continue;
    }
    seen.add(label);
    const citation = byLabel.get(label);
    if (citation) {
      cited.push(citation);
    } else {
      unresolvedLabels.push(label);
    }
  }

  return { cited, unresolvedLabels };
};
