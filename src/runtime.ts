import { openEmbeddingCache, type EmbeddingCache } from "./clients/embedding-cache.js";
import { config, type Config } from "./config/index.js";
import { AnswerService } from "./modules/assistant/answer-service.js";
import { loadCorpusFile } from "./modules/corpus/corpus-loader.js";
import { CorpusStore, type LoadReport } from "./modules/corpus/corpus-store.js";
import type { BackfillResult } from "./modules/corpus/embedding-backfill.js";
import type { RawRecord } from "./modules/corpus/types.js";
import { EmbeddingUnavailable } from "./modules/errors.js";
import { createMockProvider } from "./modules/provider/mock-provider.js";
import { createOpenAIProvider } from "./modules/provider/openai-provider.js";
import type { EmbeddingGenerationProvider } from "./modules/provider/types.js";
import { QueryOrchestrator } from "./modules/search/query-orchestrator.js";

type RuntimeConfig = Pick<
  Config,
  | "MOCK_PROVIDER"
  | "OPENAI_API_KEY"
  | "CORPUS_FILE"
  | "EMBEDDING_CACHE_FILE"
  | "SEARCH_MAX_RESULTS"
  | "SEMANTIC_BLEND_WEIGHT"
  | "CONTEXT_BUDGET_CHARS"
>;

export interface RetrievalRuntime {
  store: CorpusStore;
  orchestrator: QueryOrchestrator;
  answers: AnswerService;
  provider: EmbeddingGenerationProvider | null;
  loadRecords(records: readonly RawRecord[]): Promise<LoadReport>;
  reloadCorpus(filePath?: string): Promise<LoadReport>;
  embedCorpus(options?: { requestId?: string }): Promise<BackfillResult & { version: number }>;
}

export interface RuntimeOptions {
  config?: RuntimeConfig;
  provider?: EmbeddingGenerationProvider | null;
  store?: CorpusStore;
  openCache?: (filePath?: string) => Promise<EmbeddingCache>;
  loadFile?: (filePath: string) => Promise<RawRecord[]>;
}

export class CorpusSourceMissingError extends Error {
  constructor() {
    super("No corpus records were given and CORPUS_FILE is not configured.");
    this.name = "CorpusSourceMissingError";
  }
}

export const resolveProvider = (runtimeConfig: RuntimeConfig): EmbeddingGenerationProvider | null => {
  if (runtimeConfig.MOCK_PROVIDER) {
    return createMockProvider();
  }
  if (runtimeConfig.OPENAI_API_KEY) {
    return createOpenAIProvider();
  }
  return null;
};

export function createRuntime(options: RuntimeOptions = {}): RetrievalRuntime {
  const runtimeConfig = options.config ?? config;
  const provider = options.provider !== undefined ? options.provider : resolveProvider(runtimeConfig);
  const store = options.store ?? new CorpusStore();
  const openCache = options.openCache ?? openEmbeddingCache;
  const loadFile = options.loadFile ?? loadCorpusFile;

  const orchestrator = new QueryOrchestrator({
    store,
    provider,
    defaults: {
      maxResults: runtimeConfig.SEARCH_MAX_RESULTS,
      blendWeight: runtimeConfig.SEMANTIC_BLEND_WEIGHT
    }
  });
  const answers = new AnswerService({
    orchestrator,
    provider,
    defaultBudget: runtimeConfig.CONTEXT_BUDGET_CHARS
  });

  return {
    store,
    orchestrator,
    answers,
    provider,
    loadRecords: (records) => store.load(records),
    async reloadCorpus(filePath) {
      const source = filePath ?? runtimeConfig.CORPUS_FILE;
      if (!source) {
        throw new CorpusSourceMissingError();
      }
      return store.load(await loadFile(source));
    },
    async embedCorpus(embedOptions = {}) {
      if (!provider) {
        throw new EmbeddingUnavailable("No embedding provider is configured.");
      }
      const cache = await openCache(runtimeConfig.EMBEDDING_CACHE_FILE);
      return store.attachEmbeddings(provider, cache, { requestId: embedOptions.requestId });
    }
  };
}
