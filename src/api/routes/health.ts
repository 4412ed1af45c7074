import type { FastifyInstance } from "fastify";
import type { CorpusStore } from "../../modules/corpus/corpus-store.js";

export interface HealthRouteDependencies {
  store: Pick<CorpusStore, "peek">;
}

/** Liveness plus the corpus state a load balancer can gate on. */
export async function registerHealthRoute(app: FastifyInstance, dependencies: HealthRouteDependencies): Promise<void> {
  app.get("/health", async () => {
    const snapshot = dependencies.store.peek();
    return {
      status: snapshot ? "ok" : "starting",
      corpus_version: snapshot?.version ?? null,
      semantic_ready: snapshot?.semantic.ready ?? false
    };
  });
}
