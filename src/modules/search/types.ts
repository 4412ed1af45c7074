import type { Document } from "../corpus/types.js";
import type { RetrievalErrorCode } from "../errors.js";

export type IntentKind = "pricing" | "claiming" | "definition" | "general";

export type Framework = "old" | "new";

export type QueryFilters = {
  region?: string;
  category?: string;
  framework?: Framework;
};

export type QueryIntent = {
  kind: IntentKind;
  matchedPhrase?: string;
  filters: QueryFilters;
};

export type ScoreBreakdown = {
  score: number;
  matchedTerms: string[];
  fieldScore: number;
  intentAligned: boolean;
  completenessBonus: number;
  regionBonus: number;
};

export type RetrievalResult = {
  document: Document;
  score: number;
  matchedTerms: string[];
  lexicalScore: number;
  similarity?: number;
};

export type SearchMode = "lexical" | "hybrid";

export type SemanticStatus = "disabled" | "used" | "unavailable";

export type RetrieveOptions = {
  semantic?: boolean;
  blendWeight?: number;
  maxResults?: number;
  filters?: QueryFilters;
  requestId?: string;
  signal?: AbortSignal;
};

export type RetrievalOutcome = {
  query: string;
  intent: QueryIntent;
  filters: QueryFilters;
  results: RetrievalResult[];
  suggestions: string[];
  semantic: SemanticStatus;
  semanticError?: RetrievalErrorCode;
  latencyMs: number;
};
