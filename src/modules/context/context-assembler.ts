import { BudgetTooSmall } from "../errors.js";
import type { SourceKind } from "../corpus/types.js";
import type { RetrievalResult } from "../search/types.js";
import { renderContextBlock } from "../../prompts/index.js";
import { buildCitations, citationLabel, type Citation } from "./citation-builder.js";

export type BudgetUnit = "characters" | "tokens";

export type ContextBudget = number | { limit: number; unit?: BudgetUnit };

export type ContextEntry = {
  citationLabel: string;
  documentId: string;
  content: string;
  sourceKind: SourceKind;
  size: number;
};

export type ContextBlock = {
  entries: ContextEntry[];
  citations: Citation[];
  rendered: string;
  totalSize: number;
  budget: { limit: number; unit: BudgetUnit };
  skippedDocumentIds: string[];
};

const CHARACTERS_PER_TOKEN = 4;

export const measure = (text: string, unit: BudgetUnit): number =>
  unit === "tokens" ? Math.ceil(text.length / CHARACTERS_PER_TOKEN) : text.length;

const normalizeBudget = (budget: ContextBudget): { limit: number; unit: BudgetUnit } => {
  const normalized = typeof budget === "number" ? { limit: budget, unit: "characters" as const } : budget;
  if (!Number.isFinite(normalized.limit) || normalized.limit < 0) {
    throw new RangeError(`Context budget must be a non-negative number, got ${normalized.limit}.`);
  }
  return { limit: Math.floor(normalized.limit), unit: normalized.unit ?? "characters" };
};

/**
 * Greedily packs ranked results into the budget. Documents are included
 * whole or not at all; one that does not fit the remaining budget is
 * skipped and packing continues with the next.
 */
export const assemble = (results: readonly RetrievalResult[], budget: ContextBudget): ContextBlock => {
  const normalizedBudget = normalizeBudget(budget);
  const { limit, unit } = normalizedBudget;

  const top = results[0];
  if (top) {
    const topSize = measure(top.document.content, unit);
    if (topSize > limit) {
      throw new BudgetTooSmall(limit, topSize);
    }
  }

  const included: RetrievalResult[] = [];
  const entries: ContextEntry[] = [];
  const skippedDocumentIds: string[] = [];
  let remaining = limit;

  for (const result of results) {
    const size = measure(result.document.content, unit);
    if (size > remaining) {
      skippedDocumentIds.push(result.document.id);
      continue;
    }
    remaining -= size;
    included.push(result);
    entries.push({
      citationLabel: citationLabel(included.length),
      documentId: result.document.id,
      content: result.document.content,
      sourceKind: result.document.sourceKind,
      size
    });
  }

  return {
    entries,
    citations: buildCitations(included),
    rendered: renderContextBlock(entries),
    totalSize: limit - remaining,
    budget: normalizedBudget,
    skippedDocumentIds
  };
};
