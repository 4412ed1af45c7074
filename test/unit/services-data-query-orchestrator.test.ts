import { describe, expect, it, vi } from "vitest";
import { chunk, withEmbedding } from "../../src/modules/corpus/chunker.js";
import { CorpusStore } from "../../src/modules/corpus/corpus-store.js";
import type { RawRecord } from "../../src/modules/corpus/types.js";
import { EmbeddingUnavailable, QueryAbortedError } from "../../src/modules/errors.js";
import type { EmbeddingGenerationProvider } from "../../src/modules/provider/types.js";
import { createIntentClassifier } from "../../src/modules/search/intent-classifier.js";
import { buildLexicalIndex } from "../../src/modules/search/lexical-index.js";
import { passesFilters, QueryOrchestrator } from "../../src/modules/search/query-orchestrator.js";
import { editDistance, findNearMisses, suggestForEmptyResult, suggestRefinements } from "../../src/modules/search/suggestions.js";
import { getDefaultVocabulary } from "../../src/modules/search/vocabulary.js";
import { guidanceRecord, occupationalTherapy, priceLimitsGuidance, sampleRecords, tableProvider } from "../helpers/fixtures.js";

const OT = "pricing_15_056_0128_1_3";
const SELF_CARE = "pricing_01_011_0107_1_1";
const TRAVEL_RULE = "rule_provider_travel";
const PRICE_LIMITS = "guidance_price_limits";

const createHarness = async (
  options: {
    records?: RawRecord[];
    vectors?: number[][];
    provider?: EmbeddingGenerationProvider | null;
  } = {}
) => {
  const store = new CorpusStore({ logInfo: vi.fn() });
  const { documents } = chunk(options.records ?? sampleRecords());
  const vectors = options.vectors;
  await store.loadDocuments(
    vectors ? documents.map((document, position) => withEmbedding(document, vectors[position])) : documents
  );

  let clock = 100;
  const dependencies = {
    logInfo: vi.fn(),
    logWarn: vi.fn(),
    recordSearch: vi.fn()
  };
  const orchestrator = new QueryOrchestrator({
    store,
    classifier: createIntentClassifier(getDefaultVocabulary()),
    provider: options.provider ?? null,
    now: () => {
      clock += 5;
      return clock;
    },
    ...dependencies
  });
  return { store, orchestrator, ...dependencies };
};

const ids = (results: ReadonlyArray<{ document: { id: string } }>): string[] => results.map((result) => result.document.id);

describe("modules/search/suggestions", () => {
  it("measures edit distance", () => {
    expect(editDistance("therapy", "theraphy")).toBe(1);
    expect(editDistance("kitten", "sitting")).toBe(3);
    expect(editDistance("", "abc")).toBe(3);
  });

  it("offers near-miss vocabulary tokens for unknown terms", () => {
    const index = buildLexicalIndex(chunk([occupationalTherapy()]).documents);

    expect(findNearMisses(["theraphy"], index)).toEqual(["therapy"]);
    expect(findNearMisses(["therapy"], index)).toEqual([]);
    expect(suggestForEmptyResult({ query: "theraphy", terms: ["theraphy"], filters: {}, matchedBeforeFilters: 0, index })).toEqual([
      "Did you mean: therapy?"
    ]);
  });

  it("explains filter misses, missing terms and plain misses", () => {
    const index = buildLexicalIndex(chunk([occupationalTherapy()]).documents);

    expect(
      suggestForEmptyResult({ query: "therapy", terms: ["therapy"], filters: { region: "QLD" }, matchedBeforeFilters: 1, index })
    ).toEqual(["No match for filters region=QLD. Try removing a filter."]);
    expect(suggestForEmptyResult({ query: "the", terms: [], filters: {}, matchedBeforeFilters: 0, index })).toEqual([
      "Add a more specific term, such as a support item name, rule, or topic."
    ]);
    expect(suggestForEmptyResult({ query: " zebra ", terms: ["zebra"], filters: {}, matchedBeforeFilters: 0, index })).toEqual([
      'No documents matched "zebra". Try different or fewer search terms.'
    ]);
  });

  it("suggests refinements for broad pricing queries", () => {
    expect(suggestRefinements({ intent: "pricing", filters: {}, candidateCount: 3 })).toEqual([
      "Add your state or territory to see local pricing (e.g. 'in NSW')."
    ]);
    expect(suggestRefinements({ intent: "general", filters: {}, candidateCount: 51 })).toEqual([
      "Try being more specific, for example by adding a category or state."
    ]);
  });
});

describe("modules/search/query-orchestrator", () => {
  it("ranks a regional pricing query and keeps the price text intact", async () => {
    const { orchestrator, logInfo, recordSearch } = await createHarness();

    const outcome = await orchestrator.retrieve("price for occupational therapy in NSW", { requestId: "req-1" });

    expect(outcome.intent).toEqual({ kind: "pricing", matchedPhrase: "price for", filters: { region: "NSW" } });
    expect(ids(outcome.results)).toEqual([OT, SELF_CARE, PRICE_LIMITS, TRAVEL_RULE]);
    expect(outcome.results.map((result) => result.score)).toEqual([12.5, 4.5, 3, 1]);
    expect(outcome.results[0].document.content).toContain("NSW: $193.99");
    expect(outcome.suggestions).toEqual([]);
    expect(outcome.semantic).toBe("disabled");
    expect(outcome.latencyMs).toBe(5);
    expect(recordSearch).toHaveBeenCalledWith({ latencyMs: 5, resultCount: 4, semantic: "disabled" });
    expect(logInfo).toHaveBeenCalledWith(
      "search.retrieve.complete",
      { requestId: "req-1", corpusVersion: 1 },
      expect.objectContaining({ intent: "pricing", result_count: 4, semantic: "disabled" })
    );
  });

  it("returns identical results for identical queries", async () => {
    const { orchestrator } = await createHarness();

    const first = await orchestrator.retrieve("therapy price");
    const second = await orchestrator.retrieve("therapy price");

    expect(second.results).toEqual(first.results);
  });

  it("ranks the only document with every term in its title first on every run", async () => {
    const { orchestrator } = await createHarness({
      records: [priceLimitsGuidance(), occupationalTherapy(), guidanceRecord({ heading: "Therapy Notes", body: "occupational notes" })]
    });

    const runs = await Promise.all([1, 2, 3].map(() => orchestrator.retrieve("occupational therapy")));

    for (const run of runs) {
      expect(ids(run.results)).toEqual([OT, "guidance_therapy_notes"]);
    }
  });

  it("breaks score ties by ingestion order", async () => {
    const alpha = guidanceRecord({ heading: "Alpha Note", body: "shared wording" });
    const beta = guidanceRecord({ heading: "Beta Note", body: "shared wording" });

    const forward = await (await createHarness({ records: [alpha, beta] })).orchestrator.retrieve("shared");
    const reversed = await (await createHarness({ records: [beta, alpha] })).orchestrator.retrieve("shared");

    expect(ids(forward.results)).toEqual(["guidance_alpha_note", "guidance_beta_note"]);
    expect(ids(reversed.results)).toEqual(["guidance_beta_note", "guidance_alpha_note"]);
  });

  it("applies caller filters over extracted ones and excludes unpriced regions", async () => {
    const { orchestrator } = await createHarness();

    const outcome = await orchestrator.retrieve("occupational therapy price in NSW", { filters: { region: "qld" } });

    expect(outcome.filters).toEqual({ region: "QLD" });
    expect(ids(outcome.results)).toEqual([SELF_CARE, PRICE_LIMITS, TRAVEL_RULE]);
    expect(outcome.results.map((result) => result.score)).toEqual([3.5, 3, 1]);
  });

  it("truncates to maxResults", async () => {
    const { orchestrator } = await createHarness();

    const outcome = await orchestrator.retrieve("price for occupational therapy in NSW", { maxResults: 1 });

    expect(ids(outcome.results)).toEqual([OT]);
    await expect(orchestrator.retrieve("therapy", { maxResults: 0 })).rejects.toBeInstanceOf(RangeError);
  });

  it("returns no results with a suggestion when nothing matches", async () => {
    const { orchestrator, recordSearch } = await createHarness();

    const outcome = await orchestrator.retrieve("zebra");

    expect(outcome.results).toEqual([]);
    expect(outcome.suggestions).toEqual(['No documents matched "zebra". Try different or fewer search terms.']);
    expect(recordSearch).toHaveBeenCalledWith({ latencyMs: 5, resultCount: 0, semantic: "disabled" });
  });

  it("blends normalised lexical scores with similarity in hybrid mode", async () => {
    const provider = tableProvider({ "occupational therapy": [1, 0] });
    const { orchestrator } = await createHarness({ vectors: [[1, 0], [0, 1], [0.6, 0.8], [0, 1]], provider });

    const outcome = await orchestrator.retrieve("occupational therapy", { semantic: true });

    expect(outcome.semantic).toBe("used");
    expect(ids(outcome.results)).toEqual([OT, TRAVEL_RULE]);
    expect(outcome.results[0].score).toBeCloseTo(1);
    expect(outcome.results[1].score).toBeCloseTo(0.5 / 6 + 0.3);
    expect(outcome.results[1]).toMatchObject({ lexicalScore: 1, matchedTerms: ["therapy"] });
    expect(outcome.results[1].similarity).toBeCloseTo(0.6);

    const semanticOnly = await orchestrator.retrieve("occupational therapy", { semantic: true, blendWeight: 1 });
    expect(semanticOnly.results.map((result) => result.score)).toEqual([1, expect.closeTo(0.6)]);
  });

  it("drops lexical matches whose blended score falls to zero", async () => {
    const provider = tableProvider({ "occupational therapy": [-1, 0] });
    const { orchestrator } = await createHarness({ vectors: [[1, 0], [0, 1], [0.6, 0.8], [0, 1]], provider });

    const outcome = await orchestrator.retrieve("occupational therapy", { semantic: true, blendWeight: 1 });

    expect(outcome.semantic).toBe("used");
    expect(outcome.results).toEqual([]);
  });

  it("admits semantic-only candidates with a positive blended score", async () => {
    const provider = tableProvider({ zebra: [0, 1] });
    const { orchestrator } = await createHarness({ vectors: [[1, 0], [0, 1], [0.6, 0.8], [0, 1]], provider });

    const outcome = await orchestrator.retrieve("zebra", { semantic: true });

    expect(ids(outcome.results)).toEqual([SELF_CARE, PRICE_LIMITS, TRAVEL_RULE]);
    expect(outcome.results[0]).toMatchObject({ score: 0.5, lexicalScore: 0, matchedTerms: [] });
  });

  it("degrades to lexical-only with a warning when embeddings are missing", async () => {
    const { orchestrator, logWarn } = await createHarness({ provider: tableProvider({}) });

    const outcome = await orchestrator.retrieve("price for occupational therapy in NSW", { semantic: true });

    expect(outcome.semantic).toBe("unavailable");
    expect(outcome.semanticError).toBe("embedding_unavailable");
    expect(outcome.results[0].score).toBe(12.5);
    expect(logWarn).toHaveBeenCalledWith(
      "search.semantic.degraded",
      { requestId: undefined, corpusVersion: 1 },
      expect.objectContaining({ error_code: "embedding_unavailable" })
    );
  });

  it("degrades when the provider cannot embed the query", async () => {
    const provider = tableProvider({}, {
      embed: async () => {
        throw new EmbeddingUnavailable("provider down");
      }
    });
    const { orchestrator } = await createHarness({ vectors: [[1, 0], [0, 1], [0.6, 0.8], [0, 1]], provider });

    const outcome = await orchestrator.retrieve("therapy", { semantic: true });

    expect(outcome.semantic).toBe("unavailable");
    expect(ids(outcome.results)).toEqual([OT, TRAVEL_RULE]);
  });

  it("rejects aborted queries before and after the provider call", async () => {
    const controller = new AbortController();
    const provider = tableProvider({}, {
      embed: async () => {
        controller.abort();
        return [1, 0];
      }
    });
    const { orchestrator } = await createHarness({ vectors: [[1, 0], [0, 1], [0.6, 0.8], [0, 1]], provider });

    await expect(orchestrator.retrieve("therapy", { semantic: true, signal: controller.signal })).rejects.toBeInstanceOf(
      QueryAbortedError
    );
    await expect(orchestrator.retrieve("therapy", { signal: controller.signal })).rejects.toBeInstanceOf(QueryAbortedError);
  });

  it("keeps reading the snapshot it started with while a rebuild swaps in", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const provider = tableProvider({}, {
      embed: async () => {
        await gate;
        return [1, 0];
      }
    });
    const { store, orchestrator } = await createHarness({ vectors: [[1, 0], [0, 1], [0.6, 0.8], [0, 1]], provider });

    const pending = orchestrator.retrieve("therapy", { semantic: true });
    await store.load([priceLimitsGuidance()]);
    release();
    const outcome = await pending;

    expect(store.snapshot.version).toBe(2);
    expect(ids(outcome.results)[0]).toBe(OT);
  });
});

describe("modules/search/query-orchestrator passesFilters", () => {
  const { documents } = chunk(sampleRecords());
  const [ot, , rule, guidance] = documents;

  it("lets documents without the filtered attribute through", () => {
    expect(passesFilters(guidance, { region: "QLD", category: "Transport", framework: "new" })).toBe(true);
  });

  it("filters by region, category and framework", () => {
    expect(passesFilters(ot, { region: "QLD" })).toBe(false);
    expect(passesFilters(ot, { region: "VIC" })).toBe(true);
    expect(passesFilters(ot, { category: "improved daily living" })).toBe(true);
    expect(passesFilters(ot, { category: "Transport" })).toBe(false);
    expect(passesFilters(rule, { framework: "old" })).toBe(true);
    expect(passesFilters(rule, { framework: "new" })).toBe(false);
  });
});
