import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { config } from "./config/index.js";
import { errorFields, logError, logInfo } from "./observability/logger.js";
import type { RetrievalRuntime } from "./runtime.js";

/** Loads the configured corpus and, when asked, attaches embeddings in the background. */
export async function prepareCorpus(
  runtime: RetrievalRuntime,
  settings: Pick<typeof config, "CORPUS_FILE" | "EMBED_ON_STARTUP"> = config
): Promise<void> {
  if (!settings.CORPUS_FILE) {
    logInfo("startup.corpus.skipped", {}, { reason: "CORPUS_FILE not set" });
    return;
  }

  const report = await runtime.reloadCorpus(settings.CORPUS_FILE);
  logInfo("startup.corpus.loaded", { corpusVersion: report.version }, {
    document_count: report.documentCount,
    error_count: report.errors.length
  });

  if (settings.EMBED_ON_STARTUP && runtime.provider) {
    void runtime.embedCorpus().then(
      (result) => logInfo("startup.embeddings.attached", { corpusVersion: result.version }, { embedded: result.embedded }),
      (error: unknown) => logError("startup.embeddings.failed", {}, errorFields(error))
    );
  }
}

export async function bootstrap(): Promise<void> {
  const { app, runtime } = await buildApp();
  await prepareCorpus(runtime);
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("startup.failed", {}, errorFields(error));
    process.exitCode = 1;
  });
}
