import { logDebug, logInfo, logWarn } from "../../observability/logger.js";
import { recordSearch, type SearchSample } from "../../observability/metrics.js";
import type { CorpusSnapshot, CorpusStore } from "../corpus/corpus-store.js";
import type { Document } from "../corpus/types.js";
import { EmbeddingUnavailable, QueryAbortedError, type RetrievalErrorCode } from "../errors.js";
import type { EmbeddingGenerationProvider } from "../provider/types.js";
import { classify as defaultClassify, type IntentClassifier } from "./intent-classifier.js";
import { compareRanked } from "./ranking.js";
import { createRelevanceScorer } from "./relevance-scorer.js";
import { suggestForEmptyResult, suggestRefinements } from "./suggestions.js";
import { extractQueryTerms } from "./tokenizer.js";
import type {
  QueryFilters,
  QueryIntent,
  RetrievalOutcome,
  RetrievalResult,
  RetrieveOptions,
  SemanticStatus
} from "./types.js";
import { getDefaultVocabulary } from "./vocabulary.js";

export type RetrievalDefaults = {
  maxResults: number;
  blendWeight: number;
};

export interface QueryOrchestratorDependencies {
  store: CorpusStore;
  classifier?: IntentClassifier;
  provider?: EmbeddingGenerationProvider | null;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordSearch?: (sample: SearchSample) => void;
  defaults?: Partial<RetrievalDefaults>;
}

const DEFAULT_MAX_RESULTS = 20;
const DEFAULT_BLEND_WEIGHT = 0.5;

type Candidate = {
  document: Document;
  lexicalScore: number;
  matchedTerms: string[];
  similarity?: number;
};

type SemanticPass = {
  status: SemanticStatus;
  error?: RetrievalErrorCode;
  similarities: Map<string, number>;
};

const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw new QueryAbortedError();
  }
};

const sameText = (a: string, b: string): boolean => a.trim().toLowerCase() === b.trim().toLowerCase();

/** Documents lacking the filtered attribute pass every filter. */
export const passesFilters = (document: Document, filters: QueryFilters): boolean => {
  const { metadata } = document;

  if (filters.region && document.sourceKind === "pricing") {
    const regions = metadata.regions;
    if (Array.isArray(regions) && regions.length > 0 && !regions.includes(filters.region)) {
      return false;
    }
  }

  if (filters.category && typeof metadata.category === "string" && !sameText(metadata.category, filters.category)) {
    return false;
  }

  if (filters.framework && document.sourceKind === "rule") {
    const frameworks = metadata.frameworks;
    if (Array.isArray(frameworks) && !frameworks.includes(filters.framework)) {
      return false;
    }
  }

  return true;
};

const mergeFilters = (extracted: QueryFilters, overrides: QueryFilters | undefined): QueryFilters => {
  const merged: QueryFilters = { ...extracted };
  if (overrides?.region !== undefined) {
    merged.region = overrides.region.trim().toUpperCase();
  }
  if (overrides?.category !== undefined) {
    merged.category = overrides.category;
  }
  if (overrides?.framework !== undefined) {
    merged.framework = overrides.framework;
  }
  return merged;
};

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Runs one query end to end against a single corpus snapshot: classify,
 * gather lexical candidates, apply hard filters, score, optionally blend
 * with embedding similarity, rank and truncate.
 */
export class QueryOrchestrator {
  private readonly store: CorpusStore;
  private readonly classifier: Pick<IntentClassifier, "classify">;
  private readonly stopWords: ReadonlySet<string>;
  private readonly provider: EmbeddingGenerationProvider | null;
  private readonly now: () => number;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;
  private readonly recordSearch: (sample: SearchSample) => void;
  private readonly defaults: RetrievalDefaults;

  constructor(dependencies: QueryOrchestratorDependencies) {
    this.store = dependencies.store;
    this.classifier = dependencies.classifier ?? { classify: defaultClassify };
    this.stopWords =
      dependencies.classifier?.stopWords ?? new Set(getDefaultVocabulary().stopWords.map((word) => word.toLowerCase()));
    this.provider = dependencies.provider ?? null;
    this.now = dependencies.now ?? (() => Date.now());
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logWarn = dependencies.logWarn ?? logWarn;
    this.recordSearch = dependencies.recordSearch ?? recordSearch;
    this.defaults = {
      maxResults: dependencies.defaults?.maxResults ?? DEFAULT_MAX_RESULTS,
      blendWeight: dependencies.defaults?.blendWeight ?? DEFAULT_BLEND_WEIGHT
    };
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalOutcome> {
    const startedAt = this.now();
    const { signal, requestId } = options;
    throwIfAborted(signal);

    const maxResults = options.maxResults ?? this.defaults.maxResults;
    if (!Number.isInteger(maxResults) || maxResults < 1) {
      throw new RangeError(`maxResults must be a positive integer, got ${maxResults}.`);
    }
    const blendWeight = options.blendWeight ?? this.defaults.blendWeight;
    if (!Number.isFinite(blendWeight) || blendWeight < 0 || blendWeight > 1) {
      throw new RangeError(`blendWeight must be between 0 and 1, got ${blendWeight}.`);
    }

    const snapshot = this.store.snapshot;
    const extracted = this.classifier.classify(query);
    const filters = mergeFilters(extracted.filters, options.filters);
    const intent: QueryIntent = { ...extracted, filters };
    const terms = extractQueryTerms(query, this.stopWords);

    const lexical = this.lexicalCandidates(snapshot, terms, intent);

    let semantic: SemanticPass = { status: "disabled", similarities: new Map() };
    if (options.semantic) {
      semantic = await this.semanticPass(snapshot, query, { signal, requestId });
      throwIfAborted(signal);
    }

    const ranked =
      semantic.status === "used"
        ? this.blend(snapshot, lexical.candidates, semantic.similarities, filters, blendWeight)
        : lexical.candidates.map<RetrievalResult>((candidate) => ({
            document: candidate.document,
            score: candidate.lexicalScore,
            matchedTerms: candidate.matchedTerms,
            lexicalScore: candidate.lexicalScore
          }));

    const sortable = ranked.map((result) => ({ documentId: result.document.id, score: result.score, result }));
    sortable.sort(compareRanked((documentId) => snapshot.index.ordinal(documentId)));
    const results = sortable.slice(0, maxResults).map(({ result }) => result);

    const suggestions =
      results.length === 0
        ? suggestForEmptyResult({
            query,
            terms,
            filters,
            matchedBeforeFilters: lexical.matchedBeforeFilters,
            index: snapshot.index
          })
        : suggestRefinements({ intent: intent.kind, filters, candidateCount: ranked.length });

    const latencyMs = this.now() - startedAt;
    this.recordSearch({ latencyMs, resultCount: results.length, semantic: semantic.status });
    this.logInfo("search.retrieve.complete", { requestId, corpusVersion: snapshot.version }, {
      intent: intent.kind,
      filters,
      term_count: terms.length,
      candidate_count: ranked.length,
      result_count: results.length,
      semantic: semantic.status,
      latency_ms: latencyMs
    });

    return {
      query,
      intent,
      filters,
      results,
      suggestions,
      semantic: semantic.status,
      ...(semantic.error ? { semanticError: semantic.error } : {}),
      latencyMs
    };
  }

  private lexicalCandidates(
    snapshot: CorpusSnapshot,
    terms: readonly string[],
    intent: QueryIntent
  ): { candidates: Candidate[]; matchedBeforeFilters: number } {
    const { index } = snapshot;
    const scorer = createRelevanceScorer(index, this.stopWords);
    const ids = new Set<string>();
    for (const term of terms) {
      for (const id of index.postings(term)) {
        ids.add(id);
      }
    }

    const candidates: Candidate[] = [];
    for (const id of ids) {
      const document = index.document(id);
      if (!document || !passesFilters(document, intent.filters)) {
        continue;
      }
      const breakdown = scorer.scoreTerms(terms, document, intent);
      if (breakdown.score > 0) {
        candidates.push({ document, lexicalScore: breakdown.score, matchedTerms: breakdown.matchedTerms });
      }
    }
    return { candidates, matchedBeforeFilters: ids.size };
  }

  private async semanticPass(
    snapshot: CorpusSnapshot,
    query: string,
    callOptions: { signal?: AbortSignal; requestId?: string }
  ): Promise<SemanticPass> {
    try {
      if (!this.provider) {
        throw new EmbeddingUnavailable("No embedding provider is configured.");
      }
      if (!snapshot.semantic.ready) {
        throw new EmbeddingUnavailable(
          `${snapshot.semantic.missingEmbeddingCount} documents have no embedding yet.`
        );
      }
      const embedding = await this.provider.embed(query, callOptions);
      throwIfAborted(callOptions.signal);
      const matches = snapshot.semantic.search(embedding, snapshot.documents.length);
      logDebug("search.semantic.matched", { requestId: callOptions.requestId, corpusVersion: snapshot.version }, {
        dimensions: embedding.length,
        match_count: matches.length
      });
      return {
        status: "used",
        similarities: new Map(matches.map((match) => [match.documentId, clampUnit(match.similarity)]))
      };
    } catch (error) {
      if (!(error instanceof EmbeddingUnavailable)) {
        throw error;
      }
      this.logWarn("search.semantic.degraded", { requestId: callOptions.requestId, corpusVersion: snapshot.version }, {
        error_code: error.code,
        message: error.message
      });
      return { status: "unavailable", error: error.code, similarities: new Map() };
    }
  }

  private blend(
    snapshot: CorpusSnapshot,
    candidates: readonly Candidate[],
    similarities: ReadonlyMap<string, number>,
    filters: QueryFilters,
    blendWeight: number
  ): RetrievalResult[] {
    const maxLexical = candidates.reduce((max, candidate) => Math.max(max, candidate.lexicalScore), 0);
    const results: RetrievalResult[] = [];
    const seen = new Set<string>();

    for (const candidate of candidates) {
      seen.add(candidate.document.id);
      const similarity = similarities.get(candidate.document.id) ?? 0;
      const lexicalNorm = maxLexical > 0 ? candidate.lexicalScore / maxLexical : 0;
      const score = (1 - blendWeight) * lexicalNorm + blendWeight * similarity;
      if (score > 0) {
        results.push({
          document: candidate.document,
          score,
          matchedTerms: candidate.matchedTerms,
          lexicalScore: candidate.lexicalScore,
          similarity
        });
      }
    }

    for (const [documentId, similarity] of similarities) {
      if (seen.has(documentId)) {
        continue;
      }
      const document = snapshot.index.document(documentId);
      if (!document || !passesFilters(document, filters)) {
        continue;
      }
      const score = blendWeight * similarity;
      if (score > 0) {
        results.push({ document, score, matchedTerms: [], lexicalScore: 0, similarity });
      }
    }

    return results;
  }
}
