import OpenAI from "openai";
import { describe, expect, it, vi } from "vitest";
import { EmbeddingUnavailable, GenerationUnavailable, QueryAbortedError } from "../../src/modules/errors.js";
import { callWithRetry, ProviderTimeoutError } from "../../src/modules/provider/call-with-retry.js";
import { hashedEmbedding } from "../../src/modules/provider/mock-provider.js";
import { createOpenAIProvider, isTransientProviderError } from "../../src/modules/provider/openai-provider.js";
import { cosineSimilarity } from "../../src/modules/search/semantic-retriever.js";
import { getMetricsSnapshot } from "../../src/observability/metrics.js";

const noDelay = async () => undefined;

describe("modules/provider/call-with-retry", () => {
  it("retries a transient failure once", async () => {
    const operation = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok");
    const delay = vi.fn(noDelay);

    await expect(callWithRetry(operation, { timeoutMs: 1000, retryDelayMs: 10, delay })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(10);
  });

  it("does not retry permanent failures", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("bad request"));

    await expect(
      callWithRetry(operation, { timeoutMs: 1000, isTransient: () => false, delay: noDelay })
    ).rejects.toThrow("bad request");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("times out each attempt and gives up after the retry", async () => {
    const operation = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    await expect(callWithRetry(operation, { timeoutMs: 5, delay: noDelay })).rejects.toBeInstanceOf(ProviderTimeoutError);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("turns a caller abort into QueryAbortedError without retrying", async () => {
    const controller = new AbortController();
    const operation = vi.fn(
      (signal: AbortSignal) =>
        new Promise<string>((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
          controller.abort();
        })
    );

    await expect(
      callWithRetry(operation, { timeoutMs: 1000, signal: controller.signal, delay: noDelay })
    ).rejects.toBeInstanceOf(QueryAbortedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("modules/provider/openai-provider", () => {
  const createClient = () => {
    const embeddingsCreate = vi.fn();
    const completionsCreate = vi.fn();
    return {
      embeddingsCreate,
      completionsCreate,
      getClient: async () => ({
        client: {
          embeddings: { create: embeddingsCreate },
          chat: { completions: { create: completionsCreate } }
        } as unknown as Pick<OpenAI, "embeddings" | "chat">
      })
    };
  };

  it("classifies transient errors", () => {
    expect(isTransientProviderError(new OpenAI.APIConnectionError({ message: "reset" }))).toBe(true);
    expect(isTransientProviderError(new Error("plain"))).toBe(false);
  });

  it("embeds with the configured model", async () => {
    const stub = createClient();
    stub.embeddingsCreate.mockResolvedValue({ data: [{ embedding: [0.1, 0.2] }] });
    const provider = createOpenAIProvider({ getClient: stub.getClient, embeddingModel: "embed-test", delay: noDelay });

    await expect(provider.embed("therapy")).resolves.toEqual([0.1, 0.2]);
    expect(stub.embeddingsCreate).toHaveBeenCalledWith(
      { model: "embed-test", input: "therapy" },
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it("generates with guardrails and the rendered context", async () => {
    const stub = createClient();
    stub.completionsCreate.mockResolvedValue({ choices: [{ message: { content: "According to Document 1, yes." } }] });
    const provider = createOpenAIProvider({ getClient: stub.getClient, generationModel: "chat-test", delay: noDelay });

    await expect(provider.generate("CONTEXT", "Can I claim travel?")).resolves.toBe("According to Document 1, yes.");
    const [request] = stub.completionsCreate.mock.calls[0];
    expect(request).toMatchObject({ model: "chat-test", temperature: 0.1 });
    expect(request.messages[0].role).toBe("system");
    expect(request.messages[1].content).toContain("USER QUESTION: Can I claim travel?");
  });

  it("wraps failures after retries and records the error", async () => {
    const stub = createClient();
    stub.embeddingsCreate.mockRejectedValue(new OpenAI.APIConnectionError({ message: "reset" }));
    stub.completionsCreate.mockResolvedValue({ choices: [{ message: { content: "   " } }] });
    const provider = createOpenAIProvider({ getClient: stub.getClient, delay: noDelay });

    await expect(provider.embed("therapy")).rejects.toBeInstanceOf(EmbeddingUnavailable);
    expect(stub.embeddingsCreate).toHaveBeenCalledTimes(2);
    await expect(provider.generate("CONTEXT", "q")).rejects.toBeInstanceOf(GenerationUnavailable);
    expect(getMetricsSnapshot().error_rates).toEqual({ provider_embed: 1, provider_generate: 1 });
  });
});

describe("modules/provider/mock-provider", () => {
  it("places texts that share words close together", () => {
    const base = hashedEmbedding("occupational therapy standard");

    expect(cosineSimilarity(base, hashedEmbedding("occupational therapy"))).toBeGreaterThan(
      cosineSimilarity(base, hashedEmbedding("zebra crossing"))
    );
    expect(hashedEmbedding("")).toHaveLength(64);
  });
});
