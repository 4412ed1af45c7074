import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { LoadReport } from "../../modules/corpus/corpus-store.js";
import { SOURCE_KINDS } from "../../modules/corpus/types.js";
import { logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import type { RetrievalRuntime } from "../../runtime.js";
import { resolveRequestId, sendDomainError, toValidationError } from "./errors.js";

// Files are only ever read from CORPUS_FILE; clients may send records inline.
const reloadBodySchema = z
  .object({
    records: z
      .array(
        z.object({
          sourceKind: z.enum(SOURCE_KINDS),
          fields: z.record(z.string(), z.unknown())
        })
      )
      .optional()
  })
  .strict();

const serializeLoadReport = (report: LoadReport) => ({
  version: report.version,
  document_count: report.documentCount,
  errors: report.errors.map((error) => ({
    record_index: error.recordIndex,
    source_kind: error.sourceKind,
    reason: error.reason,
    message: error.message
  }))
});

export interface CorpusRoutesDependencies {
  runtime: Pick<RetrievalRuntime, "store" | "loadRecords" | "reloadCorpus" | "embedCorpus" | "provider">;
}

export async function registerCorpusRoutes(app: FastifyInstance, dependencies: CorpusRoutesDependencies): Promise<void> {
  const { runtime } = dependencies;

  app.get("/api/corpus", async () => {
    const snapshot = runtime.store.peek();
    if (!snapshot) {
      return { loaded: false };
    }
    return {
      loaded: true,
      version: snapshot.version,
      loaded_at: snapshot.loadedAt,
      document_count: snapshot.documents.length,
      vocabulary_size: snapshot.index.vocabulary().length,
      embeddings_ready: snapshot.semantic.ready,
      missing_embeddings: snapshot.semantic.missingEmbeddingCount,
      ingestion_errors: snapshot.ingestionErrors.length
    };
  });

  app.post("/api/corpus/reload", async (request, reply) => {
    const requestId = resolveRequestId(request);
    const parsed = reloadBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error));
      return;
    }

    try {
      const report = parsed.data.records
        ? await runtime.loadRecords(parsed.data.records)
        : await runtime.reloadCorpus();
      logInfo("api.corpus.reloaded", { requestId, corpusVersion: report.version }, {
        document_count: report.documentCount,
        error_count: report.errors.length
      });
      reply.send(serializeLoadReport(report));
    } catch (error) {
      sendDomainError(reply, error, requestId);
    }
  });

  app.post("/api/corpus/embed", async (request, reply) => {
    const requestId = resolveRequestId(request);
    try {
      const result = await runtime.embedCorpus({ requestId });
      reply.send({
        version: result.version,
        embedded: result.embedded,
        reused: result.reused,
        already_embedded: result.alreadyEmbedded,
        pruned_cache_entries: result.prunedCacheEntries
      });
    } catch (error) {
      sendDomainError(reply, error, requestId);
    }
  });
}
