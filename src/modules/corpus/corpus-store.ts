import type { EmbeddingCache } from "../../clients/embedding-cache.js";
import { logInfo } from "../../observability/logger.js";
import { CorpusNotLoadedError } from "../errors.js";
import type { EmbeddingGenerationProvider } from "../provider/types.js";
import { buildLexicalIndex, type LexicalIndex } from "../search/lexical-index.js";
import { SemanticRetriever } from "../search/semantic-retriever.js";
import { chunk } from "./chunker.js";
import { backfillEmbeddings, type BackfillOptions, type BackfillResult } from "./embedding-backfill.js";
import type { Document, MalformedRecordReport, RawRecord } from "./types.js";

export type CorpusSnapshot = Readonly<{
  version: number;
  loadedAt: string;
  documents: readonly Document[];
  index: LexicalIndex;
  semantic: SemanticRetriever;
  ingestionErrors: readonly MalformedRecordReport[];
}>;

export type LoadReport = {
  version: number;
  documentCount: number;
  errors: MalformedRecordReport[];
};

export interface CorpusStoreDependencies {
  now?: () => Date;
  logInfo?: typeof logInfo;
}

/**
 * Owns the corpus snapshot that queries read. Rebuilds run one at a time
 * into a fresh snapshot which then replaces the current one in a single
 * assignment; queries holding the previous snapshot keep using it.
 */
export class CorpusStore {
  private current: CorpusSnapshot | null = null;
  private queue: Promise<void> = Promise.resolve();
  private nextVersion = 1;
  private readonly now: () => Date;
  private readonly log: typeof logInfo;

  constructor(dependencies: CorpusStoreDependencies = {}) {
    this.now = dependencies.now ?? (() => new Date());
    this.log = dependencies.logInfo ?? logInfo;
  }

  get snapshot(): CorpusSnapshot {
    if (!this.current) {
      throw new CorpusNotLoadedError();
    }
    return this.current;
  }

  peek(): CorpusSnapshot | null {
    return this.current;
  }

  load(records: readonly RawRecord[]): Promise<LoadReport> {
    return this.exclusive(() => {
      const report = chunk(records);
      const snapshot = this.swap(report.documents, report.errors);
      this.log("corpus.load.complete", { corpusVersion: snapshot.version }, {
        record_count: records.length,
        document_count: report.documents.length,
        error_count: report.errors.length
      });
      return {
        version: snapshot.version,
        documentCount: report.documents.length,
        errors: report.errors
      };
    });
  }

  /** Replaces the corpus with already-chunked documents. */
  loadDocuments(documents: readonly Document[]): Promise<CorpusSnapshot> {
    return this.exclusive(() => this.swap(documents, []));
  }

  attachEmbeddings(
    provider: EmbeddingGenerationProvider,
    cache: EmbeddingCache,
    options?: BackfillOptions
  ): Promise<BackfillResult & { version: number }> {
    return this.exclusive(async () => {
      const base = this.snapshot;
      const result = await backfillEmbeddings(base.documents, provider, cache, options);
      const snapshot = this.swap(result.documents, base.ingestionErrors);
      return { ...result, version: snapshot.version };
    });
  }

  private swap(documents: readonly Document[], errors: readonly MalformedRecordReport[]): CorpusSnapshot {
    const frozenDocuments = Object.freeze([...documents]);
    const snapshot: CorpusSnapshot = Object.freeze({
      version: this.nextVersion,
      loadedAt: this.now().toISOString(),
      documents: frozenDocuments,
      index: buildLexicalIndex(frozenDocuments),
      semantic: new SemanticRetriever(frozenDocuments),
      ingestionErrors: Object.freeze([...errors])
    });
    this.nextVersion += 1;
    this.current = snapshot;
    return snapshot;
  }

  private exclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
