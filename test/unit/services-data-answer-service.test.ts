import { describe, expect, it, vi } from "vitest";
import { AnswerService } from "../../src/modules/assistant/answer-service.js";
import { CorpusStore } from "../../src/modules/corpus/corpus-store.js";
import { GenerationUnavailable } from "../../src/modules/errors.js";
import { createMockProvider } from "../../src/modules/provider/mock-provider.js";
import type { EmbeddingGenerationProvider } from "../../src/modules/provider/types.js";
import { QueryOrchestrator } from "../../src/modules/search/query-orchestrator.js";
import { NO_MATCH_ANSWER } from "../../src/prompts/index.js";
import { sampleRecords, tableProvider } from "../helpers/fixtures.js";

const createService = async (provider: EmbeddingGenerationProvider | null) => {
  const store = new CorpusStore({ logInfo: vi.fn() });
  await store.load(sampleRecords());
  const orchestrator = new QueryOrchestrator({
    store,
    provider,
    logInfo: vi.fn(),
    logWarn: vi.fn(),
    recordSearch: vi.fn()
  });
  const logInfo = vi.fn();
  return { service: new AnswerService({ orchestrator, provider, defaultBudget: 4000, logInfo }), logInfo };
};

describe("modules/assistant/answer-service", () => {
  it("maps the search mode onto semantic retrieval", async () => {
    const { service } = await createService(null);

    const lexical = await service.search("therapy");
    const hybrid = await service.search("therapy", {}, "hybrid");

    expect(lexical.semantic).toBe("disabled");
    expect(hybrid.semantic).toBe("unavailable");
    expect(hybrid.results.map((result) => result.document.id)).toEqual(
      lexical.results.map((result) => result.document.id)
    );
  });

  it("assembles context within the requested budget", async () => {
    const { service } = await createService(null);

    const { outcome, context } = await service.answerContext("price for occupational therapy in NSW", {}, 400);

    expect(outcome.results).toHaveLength(4);
    expect(context.entries[0].documentId).toBe("pricing_15_056_0128_1_3");
    expect(context.totalSize).toBeLessThanOrEqual(400);
    expect(context.budget).toEqual({ limit: 400, unit: "characters" });
  });

  it("answers from the context and resolves cited labels", async () => {
    const generate = vi.fn(async () => "According to Document 1 and Document 9, the limit is $193.99 per hour.");
    const { service, logInfo } = await createService(tableProvider({}, { generate }));

    const answer = await service.ask("price for occupational therapy in NSW", { requestId: "req-7" });

    expect(generate).toHaveBeenCalledWith(answer.context.rendered, "price for occupational therapy in NSW", {
      signal: undefined,
      requestId: "req-7"
    });
    expect(answer.generated).toBe(true);
    expect(answer.cited.map((citation) => citation.documentId)).toEqual(["pricing_15_056_0128_1_3"]);
    expect(answer.unresolvedLabels).toEqual(["Document 9"]);
    expect(logInfo).toHaveBeenCalledWith(
      "assistant.answer.complete",
      { requestId: "req-7" },
      expect.objectContaining({ provider: "table", cited_count: 1, unresolved_labels: ["Document 9"] })
    );
  });

  it("returns the no-match answer without calling the generator", async () => {
    const generate = vi.fn(async () => "unused");
    const { service } = await createService(tableProvider({}, { generate }));

    const answer = await service.ask("zebra crossings");

    expect(answer.answer).toBe(NO_MATCH_ANSWER);
    expect(answer.generated).toBe(false);
    expect(answer.outcome.suggestions.length).toBeGreaterThan(0);
    expect(generate).not.toHaveBeenCalled();
  });

  it("surfaces GenerationUnavailable when no provider is configured", async () => {
    const { service } = await createService(null);

    await expect(service.ask("therapy")).rejects.toBeInstanceOf(GenerationUnavailable);
  });

  it("works end to end with the offline mock provider", async () => {
    const { service } = await createService(createMockProvider());

    const answer = await service.ask("price for occupational therapy in NSW");

    expect(answer.answer).toBe("According to Document 1, Support Item: Occupational Therapy - Standard");
    expect(answer.cited.map((citation) => citation.label)).toEqual(["Document 1"]);
  });
});
