import { embeddingCacheKey, type EmbeddingCache } from "../../clients/embedding-cache.js";
import { errorFields, logInfo, logWarn } from "../../observability/logger.js";
import { QueryAbortedError } from "../errors.js";
import type { EmbeddingGenerationProvider } from "../provider/types.js";
import { withEmbedding } from "./chunker.js";
import type { Document } from "./types.js";

export type BackfillResult = {
  documents: Document[];
  embedded: number;
  reused: number;
  alreadyEmbedded: number;
  prunedCacheEntries: number;
};

export interface BackfillOptions {
  requestId?: string;
  signal?: AbortSignal;
  progressEvery?: number;
  logInfo?: typeof logInfo;
}

const DEFAULT_PROGRESS_EVERY = 25;

/**
 * Returns the documents with embeddings attached, reusing cached vectors
 * whose id and content hash still match. Cache entries for documents that
 * no longer exist, or whose content changed, are pruned before the flush.
 */
export async function backfillEmbeddings(
  documents: readonly Document[],
  provider: EmbeddingGenerationProvider,
  cache: EmbeddingCache,
  options: BackfillOptions = {}
): Promise<BackfillResult> {
  const log = options.logInfo ?? logInfo;
  const progressEvery = Math.max(1, options.progressEvery ?? DEFAULT_PROGRESS_EVERY);
  const context = { requestId: options.requestId ?? null };
  const output: Document[] = [];
  let embedded = 0;
  let reused = 0;
  let alreadyEmbedded = 0;

  try {
    for (const [position, document] of documents.entries()) {
      if (options.signal?.aborted) {
        throw new QueryAbortedError();
      }
      const key = embeddingCacheKey(document);

      if (document.embedding) {
        alreadyEmbedded += 1;
        cache.set(key, document.embedding);
        output.push(document);
        continue;
      }

      const cached = cache.get(key);
      if (cached) {
        reused += 1;
        output.push(withEmbedding(document, cached));
        continue;
      }

      const vector = await provider.embed(document.content, { signal: options.signal, requestId: options.requestId });
      cache.set(key, vector);
      embedded += 1;
      output.push(withEmbedding(document, vector));

      if (embedded % progressEvery === 0) {
        log("corpus.embeddings.progress", context, { position: position + 1, total: documents.length, embedded });
      }
    }
  } catch (error) {
    // Vectors embedded before the failure stay in the cache file.
    await cache.flush().catch((flushError: unknown) =>
      logWarn("corpus.embeddings.flush_failed", context, errorFields(flushError))
    );
    throw error;
  }

  const prunedCacheEntries = cache.prune(new Set(output.map(embeddingCacheKey)));
  await cache.flush();

  log("corpus.embeddings.complete", context, {
    provider: provider.name,
    total: documents.length,
    embedded,
    reused,
    already_embedded: alreadyEmbedded,
    pruned_cache_entries: prunedCacheEntries
  });

  return { documents: output, embedded, reused, alreadyEmbedded, prunedCacheEntries };
}
