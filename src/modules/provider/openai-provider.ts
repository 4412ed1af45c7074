import OpenAI from "openai";
import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { errorFields, logWarn } from "../../observability/logger.js";
import { recordErrorRate, recordProviderLatency } from "../../observability/metrics.js";
import { buildGenerationMessages } from "../../prompts/index.js";
import { EmbeddingUnavailable, GenerationUnavailable, QueryAbortedError } from "../errors.js";
import { callWithRetry } from "./call-with-retry.js";
import type { EmbeddingGenerationProvider, ProviderCallOptions } from "./types.js";

type OpenAIClientLike = Pick<OpenAI, "embeddings" | "chat">;

export interface OpenAIProviderOptions {
  getClient?: () => Promise<{ client: OpenAIClientLike }>;
  embeddingModel?: string;
  generationModel?: string;
  timeoutMs?: number;
  retryDelayMs?: number;
  maxOutputTokens?: number;
  now?: () => number;
  delay?: (ms: number) => Promise<void>;
}

const TRANSIENT_STATUS_CODES = new Set([408, 409, 429]);

export const isTransientProviderError = (error: unknown): boolean => {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return typeof status === "number" && (TRANSIENT_STATUS_CODES.has(status) || status >= 500);
  }
  return false;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }
  return "";
};

export function createOpenAIProvider(options: OpenAIProviderOptions = {}): EmbeddingGenerationProvider {
  const getClient = options.getClient ?? getOpenAIClient;
  const embeddingModel = options.embeddingModel ?? config.OPENAI_EMBEDDING_MODEL;
  const generationModel = options.generationModel ?? config.OPENAI_MODEL;
  const timeoutMs = options.timeoutMs ?? config.PROVIDER_TIMEOUT_MS;
  const maxOutputTokens = options.maxOutputTokens ?? 2000;
  const now = options.now ?? Date.now;

  const run = async <T>(
    operationName: "embed" | "generate",
    callOptions: ProviderCallOptions | undefined,
    operation: (client: OpenAIClientLike, signal: AbortSignal) => Promise<T>
  ): Promise<T> => {
    const startedAt = now();
    try {
      const { client } = await getClient();
      return await callWithRetry((signal) => operation(client, signal), {
        timeoutMs,
        retries: 1,
        retryDelayMs: options.retryDelayMs,
        isTransient: isTransientProviderError,
        signal: callOptions?.signal,
        delay: options.delay
      });
    } catch (error) {
      if (error instanceof QueryAbortedError) {
        throw error;
      }
      recordErrorRate(`provider_${operationName}`);
      logWarn(
        `provider.${operationName}.failed`,
        { requestId: callOptions?.requestId ?? null },
        { provider: "openai", ...errorFields(error) }
      );
      const message = `OpenAI ${operationName} failed: ${describeError(error)}`;
      throw operationName === "embed"
        ? new EmbeddingUnavailable(message, { cause: error })
        : new GenerationUnavailable(message, { cause: error });
    } finally {
      recordProviderLatency(now() - startedAt);
    }
  };

  return {
    name: "openai",

    embed(text, callOptions) {
      return run("embed", callOptions, async (client, signal) => {
        const response = await client.embeddings.create({ model: embeddingModel, input: text }, { signal });
        const embedding = response.data?.[0]?.embedding;
        if (!Array.isArray(embedding) || embedding.length === 0) {
          throw new Error("Embedding response missing vector payload.");
        }
        return embedding;
      });
    },

    generate(promptContext, question, callOptions) {
      return run("generate", callOptions, async (client, signal) => {
        const response = await client.chat.completions.create(
          {
            model: generationModel,
            temperature: 0.1,
            max_tokens: maxOutputTokens,
            messages: buildGenerationMessages(promptContext, question)
          },
          { signal }
        );
        const content = normalizeCompletionContent(response.choices?.[0]?.message?.content);
        if (content.trim().length === 0) {
          throw new Error("Generation returned empty content.");
        }
        return content;
      });
    }
  };
}
