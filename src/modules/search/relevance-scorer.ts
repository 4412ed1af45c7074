import { EXPECTED_REGIONS } from "../corpus/chunker.js";
import type { Document, SourceKind } from "../corpus/types.js";
import { FIELD_WEIGHTS, type LexicalIndex } from "./lexical-index.js";
import { extractQueryTerms } from "./tokenizer.js";
import type { IntentKind, QueryIntent, ScoreBreakdown } from "./types.js";

const INTENT_ALIGNMENT_MULTIPLIER = 1.5;
const COMPLETENESS_BONUS = 1.0;
const REGION_MATCH_BONUS = 0.5;

const ALIGNED_SOURCE: Readonly<Record<IntentKind, SourceKind | null>> = {
  pricing: "pricing",
  claiming: "rule",
  definition: "guidance",
  general: null
};

const readRegions = (document: Document): readonly string[] => {
  const regions = document.metadata.regions;
  return Array.isArray(regions) ? regions : [];
};

const hasCompletePricing = (document: Document): boolean => {
  if (document.sourceKind !== "pricing") {
    return false;
  }
  const regions = readRegions(document);
  return EXPECTED_REGIONS.every((region) => regions.includes(region));
};

const ZERO_SCORE: Omit<ScoreBreakdown, "intentAligned"> = {
  score: 0,
  matchedTerms: [],
  fieldScore: 0,
  completenessBonus: 0,
  regionBonus: 0
};

export interface RelevanceScorer {
  score(query: string, document: Document, intent: QueryIntent): number;
  explain(query: string, document: Document, intent: QueryIntent): ScoreBreakdown;
  scoreTerms(terms: readonly string[], document: Document, intent: QueryIntent): ScoreBreakdown;
}

/**
 * Field-weighted term matching, multiplied for source/intent alignment,
 * plus pricing bonuses. Bonuses only apply once a query term has matched,
 * so a document with no matching term always scores zero.
 */
export const createRelevanceScorer = (index: LexicalIndex, stopWords: ReadonlySet<string>): RelevanceScorer => {
  const scoreTerms = (terms: readonly string[], document: Document, intent: QueryIntent): ScoreBreakdown => {
    const intentAligned = ALIGNED_SOURCE[intent.kind] === document.sourceKind;
    const matchedTerms: string[] = [];
    let fieldScore = 0;

    for (const term of terms) {
      const fields = index.fieldsFor(term, document.id);
      if (fields.size === 0) {
        continue;
      }
      let weight = 0;
      for (const field of fields) {
        weight = Math.max(weight, FIELD_WEIGHTS[field]);
      }
      fieldScore += weight;
      matchedTerms.push(term);
    }

    if (fieldScore === 0) {
      return { ...ZERO_SCORE, intentAligned };
    }

    const completenessBonus = hasCompletePricing(document) ? COMPLETENESS_BONUS : 0;
    const requestedRegion = intent.filters.region;
    const regionBonus = requestedRegion && readRegions(document).includes(requestedRegion) ? REGION_MATCH_BONUS : 0;
    const score = fieldScore * (intentAligned ? INTENT_ALIGNMENT_MULTIPLIER : 1) + completenessBonus + regionBonus;

    return {
      score,
      matchedTerms,
      fieldScore,
      intentAligned,
      completenessBonus,
      regionBonus
    };
  };

  const explain = (query: string, document: Document, intent: QueryIntent): ScoreBreakdown =>
    scoreTerms(extractQueryTerms(query, stopWords), document, intent);

  return {
    score: (query, document, intent) => explain(query, document, intent).score,
    explain,
    scoreTerms
  };
};
